// Type definitions for compliance checks and their results

// ============================
// VERDICTS
// ============================

export type ComplianceStatus = 'Pass' | 'Fail' | 'Error' | 'Manual';

// Legacy numeric codes consumed by reporting: 1=Pass, 2=Manual, 3=Fail/Error
export type StatusId = 1 | 2 | 3;

export type FindingValue = string | number | boolean | null | string[];

/**
 * Evaluation of one resource instance (mailbox, policy, domain, ...).
 * `IsCompliant: null` means the instance could not be judged automatically.
 */
export interface ResourceFinding {
  ResourceName: string;
  IsCompliant: boolean | null;
  [field: string]: FindingValue;
}

export interface EvaluatedResult {
  status: 'Pass' | 'Fail' | 'Manual';
  details: ResourceFinding[];
}

export interface ErrorResult {
  status: 'Error';
  details: [];
  error: string;
}

export type ComplianceResult = EvaluatedResult | ErrorResult;

// Serialized shape handed to reporting layers
export interface WireResult {
  status: ComplianceStatus;
  status_id: StatusId;
  Details: ResourceFinding[];
  Error?: string;
}

// ============================
// CHECK DEFINITIONS
// ============================

export type CheckLevel = 'L1' | 'L2';

export interface CheckMetadata {
  Title: string;
  Level: CheckLevel;
  Section: string;
  SubSection: string;
  RecommendationId: string;
  ProfileApplicability: string;
  Description: string;
  Remediation: string;
  DefaultValue: string;
  References: string[];
}

/**
 * What a control concludes when the API returns no resource instances.
 * Every check states this explicitly; absence is not assumed compliant.
 */
export interface EmptyResourcePolicy {
  compliant: boolean;
  resourceName: string;
  reason: string;
}

// ============================
// RUNNER RECORDS
// ============================

export interface CheckRunRecord {
  CheckId: string;
  Category: CheckLevel;
  Status: ComplianceStatus;
  StatusId: StatusId;
  StartTime: string;
  EndTime: string;
  Duration: number;
  Details: ResourceFinding[];
  Error?: string;
  Metadata: CheckMetadata;
}

export interface DriftEvent {
  CheckId: string;
  Title: string;
  DriftType: 'pass_to_fail' | 'fail_to_pass';
  PreviousStatus: 'Pass' | 'Fail';
  CurrentStatus: 'Pass' | 'Fail';
  DetectedAt: string;
}

export interface ScanReport {
  ScanId: string;
  TenantId: string;
  StartedAt: string;
  CompletedAt: string;
  DurationMs: number;

  // Summary
  TotalChecks: number;
  Passed: number;
  Failed: number;
  Errors: number;
  Manual: number;
  CompliancePercentage: number;

  DriftEvents: DriftEvent[];
  Results: CheckRunRecord[];
}

export interface ScanProgressEvent {
  ScanId: string;
  CheckId: string;
  Status: ComplianceStatus;
  Completed: number;
  Total: number;
}
