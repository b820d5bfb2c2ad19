import { z } from '../security';
import { defineCheck } from '../service/compliance-check';

const ConnectionFilterPolicySchema = z.object({
  Identity: z.string(),
  IPAllowList: z.optional(z.array(z.string())),
});

export const connectionFilterAllowList = defineCheck({
  id: '2.1.12',
  metadata: {
    Title: 'Ensure the connection filter IP allow list is not used',
    Level: 'L1',
    Section: '2 Microsoft 365 Defender',
    SubSection: '2.1 Email and collaboration',
    RecommendationId: '2.1.12',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'Senders on the IP allow list skip spam filtering and sender authentication.',
    Remediation: 'Remove every entry from the IP allow list of the default connection filter policy.',
    DefaultValue: 'The IP allow list is empty.',
    References: ['https://learn.microsoft.com/en-us/powershell/module/exchange/get-hostedconnectionfilterpolicy'],
  },
  // The default policy always exists; a missing policy is raised as an error by the client
  whenEmpty: {
    compliant: false,
    resourceName: 'Default',
    reason: 'The default connection filter policy was not returned',
  },

  async collect(session) {
    const policy = await session.exchange.getPolicy('Get-HostedConnectionFilterPolicy', 'Default', ConnectionFilterPolicySchema);
    const allowList = policy.IPAllowList ?? [];

    return [{
      ResourceName: policy.Identity,
      IPAllowList: allowList,
      IsCompliant: allowList.length === 0,
    }];
  },
});
