import { z } from '../security';
import { defineCheck } from '../service/compliance-check';

const SharePointSettingsSchema = z.object({
  sharingCapability: z.enum([
    'disabled',
    'externalUserSharingOnly',
    'externalUserAndGuestSharing',
    'existingExternalUserSharingOnly',
  ] as const),
});

export const sharePointExternalSharing = defineCheck({
  id: '7.2.3',
  metadata: {
    Title: 'Ensure external content sharing is restricted',
    Level: 'L1',
    Section: '7 SharePoint admin center',
    SubSection: '7.2 Policies',
    RecommendationId: '7.2.3',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: "SharePoint external sharing should be no more permissive than 'New and existing guests'.",
    Remediation: "Set the SharePoint sharing level to 'New and existing guests' or lower.",
    DefaultValue: 'Anyone',
    References: ['https://learn.microsoft.com/en-us/graph/api/resources/sharepointsettings'],
  },
  whenEmpty: {
    compliant: false,
    resourceName: 'SharePoint tenant',
    reason: 'SharePoint settings were not returned',
  },

  async collect(session) {
    const settings = await session.directory.getSharePointSettings(SharePointSettingsSchema);

    return [{
      ResourceName: 'SharePoint tenant',
      SharingCapability: settings.sharingCapability,
      IsCompliant: settings.sharingCapability !== 'externalUserAndGuestSharing',
    }];
  },
});
