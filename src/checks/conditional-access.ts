// Shared schema and predicates for conditional access controls
import { Infer, z } from '../security';

export const ConditionalAccessPolicySchema = z.object({
  id: z.string(),
  displayName: z.string(),
  state: z.enum(['enabled', 'disabled', 'enabledForReportingButNotEnforced'] as const),
  conditions: z.object({
    users: z.optional(z.object({
      includeUsers: z.optional(z.array(z.string())),
      excludeUsers: z.optional(z.array(z.string())),
      includeRoles: z.optional(z.array(z.string())),
      excludeRoles: z.optional(z.array(z.string())),
    })),
    applications: z.optional(z.object({
      includeApplications: z.optional(z.array(z.string())),
    })),
  }),
  grantControls: z.optional(z.object({
    operator: z.optional(z.string()),
    builtInControls: z.optional(z.array(z.string())),
    authenticationStrength: z.optional(z.object({
      id: z.string(),
    })),
  })),
});

export type ConditionalAccessPolicy = Infer<typeof ConditionalAccessPolicySchema>;

export function isEnforced(policy: ConditionalAccessPolicy): boolean {
  return policy.state === 'enabled';
}

export function includedUsers(policy: ConditionalAccessPolicy): string[] {
  return policy.conditions.users?.includeUsers ?? [];
}

export function includedRoles(policy: ConditionalAccessPolicy): string[] {
  return policy.conditions.users?.includeRoles ?? [];
}

export function excludedRoles(policy: ConditionalAccessPolicy): string[] {
  return policy.conditions.users?.excludeRoles ?? [];
}

// Roles a policy actually applies to: an exclusion wins over an inclusion
export function coveredRoles(policy: ConditionalAccessPolicy): string[] {
  const excluded = new Set(excludedRoles(policy));
  return includedRoles(policy).filter(id => !excluded.has(id));
}

export function targetsAllApplications(policy: ConditionalAccessPolicy): boolean {
  return (policy.conditions.applications?.includeApplications ?? []).includes('All');
}

export function grantControls(policy: ConditionalAccessPolicy): string[] {
  return policy.grantControls?.builtInControls ?? [];
}

export function requiresMfa(policy: ConditionalAccessPolicy): boolean {
  return grantControls(policy).includes('mfa') || policy.grantControls?.authenticationStrength !== undefined;
}
