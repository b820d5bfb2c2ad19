import { z } from '../security';
import { defineCheck } from '../service/compliance-check';

// Graph reports "never expire" as the maximum 32-bit integer
export const PASSWORDS_NEVER_EXPIRE = 2147483647;

const DomainSchema = z.object({
  id: z.string(),
  isVerified: z.boolean(),
  passwordValidityPeriodInDays: z.optional(z.number().int()),
});

export const passwordExpiration = defineCheck({
  id: '1.3.1',
  metadata: {
    Title: "Ensure the 'Password expiration policy' is set to 'Set passwords to never expire'",
    Level: 'L1',
    Section: '1 Microsoft 365 admin center',
    SubSection: '1.3 Settings',
    RecommendationId: '1.3.1',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'Forced periodic rotation leads to weaker passwords; expiry should be disabled on every verified domain.',
    Remediation: 'Set the password expiration policy of each verified domain to never expire.',
    DefaultValue: 'Passwords never expire for tenants created after 2021.',
    References: ['https://learn.microsoft.com/en-us/graph/api/resources/domain'],
  },
  // A tenant always has a verified domain; an empty answer is incomplete evidence
  whenEmpty: {
    compliant: false,
    resourceName: 'Domains',
    reason: 'No verified domains were returned',
  },

  async collect(session) {
    const domains = await session.directory.listDomains(DomainSchema);

    return domains
      .filter(d => d.isVerified)
      .map(d => ({
        ResourceName: d.id,
        PasswordValidityPeriodInDays: d.passwordValidityPeriodInDays ?? null,
        IsCompliant: d.passwordValidityPeriodInDays === PASSWORDS_NEVER_EXPIRE,
      }));
  },
});
