import { ComplianceResult, ComplianceStatus, StatusId, WireResult } from '../types';

const STATUS_IDS: Record<ComplianceStatus, StatusId> = {
  Pass: 1,
  Manual: 2,
  Fail: 3,
  Error: 3,
};

export function statusIdFor(status: ComplianceStatus): StatusId {
  return STATUS_IDS[status];
}

export function toWireResult(result: ComplianceResult): WireResult {
  if (result.status === 'Error') {
    return {
      status: result.status,
      status_id: statusIdFor(result.status),
      Details: [],
      Error: result.error,
    };
  }

  return {
    status: result.status,
    status_id: statusIdFor(result.status),
    Details: result.details,
  };
}
