import { z } from '../security';
import { defineCheck } from '../service/compliance-check';

export const GUEST_ACCESS_SETTING = 'AllowGuestUserToAccessSharedContent';

const TenantSettingsSchema = z.object({
  tenantSettings: z.array(z.object({
    settingName: z.string(),
    title: z.optional(z.string()),
    enabled: z.boolean(),
  })),
});

export const powerBiGuestAccess = defineCheck({
  id: '9.1.1',
  metadata: {
    Title: 'Ensure guest user access is restricted',
    Level: 'L1',
    Section: '9 Microsoft Fabric',
    SubSection: '9.1 Tenant settings',
    RecommendationId: '9.1.1',
    ProfileApplicability: 'E3 Level 1, E5 Level 1',
    Description: 'Guest users should not be able to access Microsoft Fabric content.',
    Remediation: "Disable 'Guest users can access Microsoft Fabric' in the Fabric admin portal.",
    DefaultValue: 'Enabled',
    References: ['https://learn.microsoft.com/en-us/rest/api/fabric/admin/tenants/list-tenant-settings'],
  },
  // Always reports one finding; a setting absent from the response is left for manual review
  whenEmpty: {
    compliant: false,
    resourceName: GUEST_ACCESS_SETTING,
    reason: 'Tenant settings were not returned',
  },

  async collect(session) {
    const { tenantSettings } = await session.fabric.get('/admin/tenantsettings', TenantSettingsSchema);
    const setting = tenantSettings.find(s => s.settingName === GUEST_ACCESS_SETTING);

    if (!setting) {
      return [{
        ResourceName: GUEST_ACCESS_SETTING,
        Reason: 'Setting not present in the tenant settings response',
        IsCompliant: null,
      }];
    }

    return [{
      ResourceName: GUEST_ACCESS_SETTING,
      Title: setting.title ?? GUEST_ACCESS_SETTING,
      Enabled: setting.enabled,
      IsCompliant: !setting.enabled,
    }];
  },
});
