import { defineCheck } from '../service/compliance-check';
import { ResourceFinding } from '../types';
import {
  ConditionalAccessPolicySchema,
  coveredRoles,
  excludedRoles,
  isEnforced,
  requiresMfa,
  targetsAllApplications,
} from './conditional-access';
import { ROLE_TEMPLATES, roleName } from './roles';

// Roles the benchmark expects an MFA policy to cover
export const ADMIN_ROLES_REQUIRING_MFA: string[] = [
  ROLE_TEMPLATES.globalAdministrator,
  ROLE_TEMPLATES.privilegedRoleAdministrator,
  ROLE_TEMPLATES.securityAdministrator,
  ROLE_TEMPLATES.exchangeAdministrator,
  ROLE_TEMPLATES.sharePointAdministrator,
  ROLE_TEMPLATES.userAdministrator,
  ROLE_TEMPLATES.conditionalAccessAdministrator,
];

export const adminMfaPolicy = defineCheck({
  id: '5.2.2.1',
  metadata: {
    Title: 'Ensure multifactor authentication is enabled for all users in administrative roles',
    Level: 'L1',
    Section: '5 Microsoft Entra admin center',
    SubSection: '5.2.2 Conditional Access',
    RecommendationId: '5.2.2.1',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'An enabled conditional access policy must require MFA for every administrative role on all cloud apps.',
    Remediation: 'Create a conditional access policy that targets the administrative roles and grants access only with MFA.',
    DefaultValue: 'No conditional access policies exist.',
    References: ['https://learn.microsoft.com/en-us/graph/api/resources/conditionalaccesspolicy'],
  },
  requiredCapability: 'Microsoft Entra ID P1',
  // Only qualifying policies are reported, so none means the control is not met
  whenEmpty: {
    compliant: false,
    resourceName: 'Conditional Access',
    reason: 'No enabled policy requires MFA for administrative roles on all cloud apps',
  },

  async collect(session) {
    const policies = await session.directory.listConditionalAccessPolicies(ConditionalAccessPolicySchema);
    const qualifying = policies.filter(p =>
      isEnforced(p) && requiresMfa(p) && targetsAllApplications(p) && coveredRoles(p).length > 0
    );
    if (qualifying.length === 0) {
      return [];
    }

    const covered = new Set(qualifying.flatMap(coveredRoles));
    const uncovered = ADMIN_ROLES_REQUIRING_MFA.filter(id => !covered.has(id)).map(roleName);

    const findings: ResourceFinding[] = qualifying.map(p => ({
      ResourceName: p.displayName,
      PolicyId: p.id,
      State: p.state,
      IncludedRoles: coveredRoles(p).map(roleName).sort(),
      ExcludedRoles: excludedRoles(p).map(roleName).sort(),
      IsCompliant: true,
    }));
    findings.push({
      ResourceName: 'Administrative role coverage',
      UncoveredRoles: uncovered,
      IsCompliant: uncovered.length === 0,
    });
    return findings;
  },
});
