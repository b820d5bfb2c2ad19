// compliance-check.ts - The evaluation contract every control follows
import { ApiRequestError, CapabilityUnavailableError, errorMessage } from '../common/errors';
import { TenantSession } from '../session/tenant-session';
import {
  CheckMetadata,
  ComplianceResult,
  EmptyResourcePolicy,
  EvaluatedResult,
  ResourceFinding,
} from '../types';

export interface CheckDefinition {
  id: string;
  metadata: CheckMetadata;
  whenEmpty: EmptyResourcePolicy;
  // Licence or feature tier the queries depend on; named in Manual findings
  requiredCapability?: string;
  collect(session: TenantSession): Promise<ResourceFinding[]>;
}

export interface ComplianceCheck {
  readonly id: string;
  readonly metadata: CheckMetadata;
  readonly whenEmpty: EmptyResourcePolicy;
  evaluate(session: TenantSession): Promise<ComplianceResult>;
}

export type EvaluationOutcome =
  | { ok: true; findings: ResourceFinding[] }
  | { ok: false; reason: 'capability'; capability: string; message: string }
  | { ok: false; reason: 'error'; message: string };

// ============================
// AGGREGATION
// ============================

export function aggregateStatus(findings: ResourceFinding[]): EvaluatedResult['status'] {
  if (findings.some(f => f.IsCompliant === false)) return 'Fail';
  if (findings.some(f => f.IsCompliant === null)) return 'Manual';
  return 'Pass';
}

// Field-order independent text of a finding, used to order findings that share a name
function canonicalFinding(finding: ResourceFinding): string {
  return JSON.stringify(Object.keys(finding).sort().map(key => [key, finding[key]]));
}

function byResourceName(a: ResourceFinding, b: ResourceFinding): number {
  if (a.ResourceName < b.ResourceName) return -1;
  if (a.ResourceName > b.ResourceName) return 1;
  const left = canonicalFinding(a);
  const right = canonicalFinding(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function emptyFinding(policy: EmptyResourcePolicy): ResourceFinding {
  return {
    ResourceName: policy.resourceName,
    Reason: policy.reason,
    IsCompliant: policy.compliant,
  };
}

export function toComplianceResult(outcome: EvaluationOutcome, whenEmpty: EmptyResourcePolicy): ComplianceResult {
  if (!outcome.ok) {
    if (outcome.reason === 'capability') {
      return {
        status: 'Manual',
        details: [{ ResourceName: outcome.capability, Reason: outcome.message, IsCompliant: null }],
      };
    }
    return { status: 'Error', details: [], error: outcome.message };
  }

  const details = outcome.findings.length > 0
    ? [...outcome.findings].sort(byResourceName)
    : [emptyFinding(whenEmpty)];

  return { status: aggregateStatus(details), details };
}

// ============================
// CHECK BOUNDARY
// ============================

export async function runControl(definition: CheckDefinition, session: TenantSession): Promise<EvaluationOutcome> {
  try {
    const findings = await definition.collect(session);
    return { ok: true, findings };
  } catch (err) {
    if (err instanceof CapabilityUnavailableError) {
      return { ok: false, reason: 'capability', capability: err.capability, message: errorMessage(err) };
    }
    if (err instanceof ApiRequestError && err.isLicenseRequired) {
      return {
        ok: false,
        reason: 'capability',
        capability: definition.requiredCapability ?? 'Required licence',
        message: errorMessage(err),
      };
    }
    return { ok: false, reason: 'error', message: errorMessage(err) };
  }
}

export function defineCheck(definition: CheckDefinition): ComplianceCheck {
  return {
    id: definition.id,
    metadata: definition.metadata,
    whenEmpty: definition.whenEmpty,

    async evaluate(session: TenantSession): Promise<ComplianceResult> {
      const outcome = await runControl(definition, session);

      if (!outcome.ok && outcome.reason === 'error') {
        session.logger.error(`Check ${definition.id} could not be evaluated`, outcome.message);
      } else if (!outcome.ok) {
        session.logger.warn(`Check ${definition.id} needs manual review`, { capability: outcome.capability });
      }

      return toComplianceResult(outcome, definition.whenEmpty);
    },
  };
}
