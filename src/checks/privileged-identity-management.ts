import { z } from '../security';
import { defineCheck } from '../service/compliance-check';
import { ROLE_TEMPLATES, roleName } from './roles';

const RoleEligibilityScheduleSchema = z.object({
  id: z.string(),
  principalId: z.string(),
  roleDefinitionId: z.string(),
  status: z.optional(z.string()),
});

// Roles that must be granted just-in-time rather than permanently
export const PIM_MANAGED_ROLES: string[] = [
  ROLE_TEMPLATES.globalAdministrator,
  ROLE_TEMPLATES.privilegedRoleAdministrator,
];

export const privilegedIdentityManagement = defineCheck({
  id: '5.3.1',
  metadata: {
    Title: "Ensure 'Privileged Identity Management' is used to manage roles",
    Level: 'L2',
    Section: '5 Microsoft Entra admin center',
    SubSection: '5.3 Identity Governance',
    RecommendationId: '5.3.1',
    ProfileApplicability: 'E5 Level 2',
    Description: 'Highly privileged roles should be held through PIM eligibility instead of permanent assignment.',
    Remediation: 'Convert permanent assignments of the privileged roles to eligible assignments in PIM.',
    DefaultValue: 'PIM is not configured.',
    References: ['https://learn.microsoft.com/en-us/graph/api/resources/unifiedroleeligibilityschedule'],
  },
  requiredCapability: 'Microsoft Entra ID P2',
  // One finding per managed role is always reported
  whenEmpty: {
    compliant: false,
    resourceName: 'Privileged Identity Management',
    reason: 'No privileged roles were evaluated',
  },

  async collect(session) {
    const schedules = await session.directory.listRoleEligibilitySchedules(RoleEligibilityScheduleSchema);

    return PIM_MANAGED_ROLES.map(templateId => {
      const eligible = schedules.filter(s =>
        s.roleDefinitionId === templateId && (s.status === undefined || s.status === 'Provisioned')
      );
      return {
        ResourceName: roleName(templateId),
        EligibleAssignments: eligible.length,
        IsCompliant: eligible.length > 0,
      };
    });
  },
});
