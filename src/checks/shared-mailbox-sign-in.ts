import { z } from '../security';
import { defineCheck } from '../service/compliance-check';
import { ResourceFinding } from '../types';

const SharedMailboxSchema = z.object({
  ExternalDirectoryObjectId: z.string(),
  UserPrincipalName: z.string(),
  DisplayName: z.optional(z.string()),
});

const AccountStateSchema = z.object({
  accountEnabled: z.boolean(),
});

export const sharedMailboxSignIn = defineCheck({
  id: '1.2.2',
  metadata: {
    Title: 'Ensure sign-in to shared mailboxes is blocked',
    Level: 'L1',
    Section: '1 Microsoft 365 admin center',
    SubSection: '1.2 Teams and groups',
    RecommendationId: '1.2.2',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'Shared mailboxes are accessed through delegation; their own accounts should not be able to sign in.',
    Remediation: 'Set accountEnabled to false on the user object behind each shared mailbox.',
    DefaultValue: 'Sign-in is allowed for new shared mailboxes.',
    References: ['https://learn.microsoft.com/en-us/powershell/module/exchange/get-exomailbox'],
  },
  // No shared mailboxes means nothing can be signed into
  whenEmpty: {
    compliant: true,
    resourceName: 'Shared mailboxes',
    reason: 'No shared mailboxes found',
  },

  async collect(session) {
    const mailboxes = await session.exchange.invokeCommand(
      'Get-EXOMailbox',
      { RecipientTypeDetails: 'SharedMailbox', ResultSize: 'Unlimited' },
      SharedMailboxSchema,
    );

    const findings: ResourceFinding[] = [];
    for (const mailbox of mailboxes) {
      const user = await session.directory.getUser(mailbox.ExternalDirectoryObjectId, ['accountEnabled'], AccountStateSchema);
      findings.push({
        ResourceName: mailbox.UserPrincipalName,
        DisplayName: mailbox.DisplayName ?? mailbox.UserPrincipalName,
        AccountEnabled: user.accountEnabled,
        IsCompliant: !user.accountEnabled,
      });
    }
    return findings;
  },
});
