import type { BloodType } from '../blood/compatibility';
import type { BloodRequestRecord, BloodRequestUrgency } from './lifecycle';

export type PublicRequestFilters = {
  bloodType?: BloodType;
  urgency?: BloodRequestUrgency;
  search?: string;
};

export type RequestSummary = {
  total: number;
  active: number;
  urgent: number;
  fulfilled: number;
};

const URGENT: readonly BloodRequestUrgency[] = ['high', 'critical'];

function byNewest(a: BloodRequestRecord, b: BloodRequestRecord): number {
  return new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime();
}

function matchesSearch(request: BloodRequestRecord, search: string): boolean {
  const needle = search.toLowerCase();
  return [request.patientName, request.hospitalName, request.description].some((field) =>
    field.toLowerCase().includes(needle)
  );
}

/**
 * Open public requests, newest first. The blood type filter is an exact
 * match on the type needed; search looks at patient, hospital and
 * description, ignoring case.
 */
export function filterPublicRequests(
  requests: readonly BloodRequestRecord[],
  filters: PublicRequestFilters = {}
): BloodRequestRecord[] {
  const search = filters.search?.trim() ?? '';
  return requests
    .filter((request) => request.status === 'active' && request.isPublic)
    .filter((request) => !filters.bloodType || request.bloodTypeNeeded === filters.bloodType)
    .filter((request) => !filters.urgency || request.urgency === filters.urgency)
    .filter((request) => !search || matchesSearch(request, search))
    .sort(byNewest);
}

// Counts cover public requests only.
export function summarizeRequests(requests: readonly BloodRequestRecord[]): RequestSummary {
  const visible = requests.filter((request) => request.isPublic);
  const active = visible.filter((request) => request.status === 'active');
  return {
    total: visible.length,
    active: active.length,
    urgent: active.filter((request) => URGENT.includes(request.urgency)).length,
    fulfilled: visible.filter((request) => request.status === 'fulfilled').length
  };
}
