import { z } from '../security';
import { defineCheck } from '../service/compliance-check';
import { ROLE_TEMPLATES } from './roles';

const MIN_GLOBAL_ADMINS = 2;
const MAX_GLOBAL_ADMINS = 4;

const RoleMemberSchema = z.object({
  id: z.string(),
  '@odata.type': z.optional(z.string()),
  displayName: z.optional(z.string()),
  userPrincipalName: z.optional(z.string()),
});

export const globalAdminCount = defineCheck({
  id: '1.1.3',
  metadata: {
    Title: 'Ensure that between two and four global admins are designated',
    Level: 'L1',
    Section: '1 Microsoft 365 admin center',
    SubSection: '1.1 Users',
    RecommendationId: '1.1.3',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'More than one global administrator avoids a single point of failure; more than four widens the attack surface.',
    Remediation: 'Add or remove members of the Global Administrator role until two to four remain.',
    DefaultValue: 'The account that created the tenant is the only global administrator.',
    References: ['https://learn.microsoft.com/en-us/graph/api/directoryrole-list-members'],
  },
  // Always reports one aggregate finding, so the empty case only documents intent
  whenEmpty: {
    compliant: false,
    resourceName: 'Global Administrator',
    reason: 'No global administrators were returned',
  },

  async collect(session) {
    const members = await session.directory.listDirectoryRoleMembers(ROLE_TEMPLATES.globalAdministrator, RoleMemberSchema);
    const admins = members
      .filter(m => m['@odata.type'] === undefined || m['@odata.type'] === '#microsoft.graph.user')
      .map(m => m.userPrincipalName ?? m.displayName ?? m.id)
      .sort();

    return [{
      ResourceName: 'Global Administrator',
      AdminCount: admins.length,
      Admins: admins,
      IsCompliant: admins.length >= MIN_GLOBAL_ADMINS && admins.length <= MAX_GLOBAL_ADMINS,
    }];
  },
});
