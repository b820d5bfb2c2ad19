import { defineCheck } from '../service/compliance-check';
import {
  ConditionalAccessPolicySchema,
  grantControls,
  includedUsers,
  isEnforced,
  targetsAllApplications,
} from './conditional-access';

const MANAGED_DEVICE_CONTROLS = ['compliantDevice', 'domainJoinedDevice'];

export const managedDevicePolicy = defineCheck({
  id: '5.2.2.8',
  metadata: {
    Title: 'Ensure a managed device is required for authentication',
    Level: 'L1',
    Section: '5 Microsoft Entra admin center',
    SubSection: '5.2.2 Conditional Access',
    RecommendationId: '5.2.2.8',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'Sign-ins from all users to all cloud apps should require a compliant or hybrid-joined device.',
    Remediation: "Create a policy for all users and all cloud apps granting access with 'Require device to be marked as compliant' or 'Require Microsoft Entra hybrid joined device'.",
    DefaultValue: 'No conditional access policies exist.',
    References: ['https://learn.microsoft.com/en-us/graph/api/resources/conditionalaccesspolicy'],
  },
  requiredCapability: 'Microsoft Entra ID P1',
  whenEmpty: {
    compliant: false,
    resourceName: 'Conditional Access',
    reason: 'No enabled policy for all users requires a compliant or hybrid-joined device',
  },

  async collect(session) {
    const policies = await session.directory.listConditionalAccessPolicies(ConditionalAccessPolicySchema);

    return policies
      .filter(p =>
        isEnforced(p)
        && includedUsers(p).includes('All')
        && targetsAllApplications(p)
        && grantControls(p).some(c => MANAGED_DEVICE_CONTROLS.includes(c))
      )
      .map(p => ({
        ResourceName: p.displayName,
        PolicyId: p.id,
        GrantControls: grantControls(p),
        RequireDeviceCompliance: grantControls(p).includes('compliantDevice'),
        RequireHybridJoin: grantControls(p).includes('domainJoinedDevice'),
        IsCompliant: true,
      }));
  },
});
