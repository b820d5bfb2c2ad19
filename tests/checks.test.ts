import { ApiRequestError } from '../src/common/errors';
import {
  adminMfaPolicy,
  connectionFilterAllowList,
  getCheck,
  globalAdminCount,
  listChecks,
  managedDevicePolicy,
  passwordExpiration,
  powerBiGuestAccess,
  privilegedIdentityManagement,
  sharedMailboxSignIn,
  sharePointExternalSharing,
} from '../src/checks';
import { PASSWORDS_NEVER_EXPIRE } from '../src/checks/password-expiration';
import { GUEST_ACCESS_SETTING } from '../src/checks/power-bi-guest-access';
import { ROLE_TEMPLATES } from '../src/checks/roles';
import { toWireResult } from '../src/service/result-serializer';
import { ComplianceResult, ResourceFinding } from '../src/types';
import { createFakeSession } from './helpers/fake-session';

const ALL_ADMIN_ROLES = [
  ROLE_TEMPLATES.globalAdministrator,
  ROLE_TEMPLATES.privilegedRoleAdministrator,
  ROLE_TEMPLATES.securityAdministrator,
  ROLE_TEMPLATES.exchangeAdministrator,
  ROLE_TEMPLATES.sharePointAdministrator,
  ROLE_TEMPLATES.userAdministrator,
  ROLE_TEMPLATES.conditionalAccessAdministrator,
];

function details(result: ComplianceResult): ResourceFinding[] {
  return result.details;
}

function caPolicy(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'policy-1',
    displayName: 'Require MFA for admins',
    state: 'enabled',
    conditions: {
      users: { includeRoles: ALL_ADMIN_ROLES },
      applications: { includeApplications: ['All'] },
    },
    grantControls: { operator: 'OR', builtInControls: ['mfa'] },
    ...overrides,
  };
}

function sharedMailbox(id: string, upn: string, displayName?: string): Record<string, unknown> {
  return { ExternalDirectoryObjectId: id, UserPrincipalName: upn, DisplayName: displayName, Alias: upn.split('@')[0] };
}

// ============================================
// CATALOGUE
// ============================================

describe('Check catalogue', () => {
  it('lists every control once in catalogue order', () => {
    expect(listChecks().map(c => c.id)).toEqual([
      '1.1.3', '1.2.2', '1.3.1', '2.1.12', '5.2.2.1', '5.2.2.8', '5.3.1', '7.2.3', '9.1.1',
    ]);
  });

  it('returns a copy of the catalogue', () => {
    const checks = listChecks();
    checks.pop();
    expect(listChecks()).toHaveLength(9);
  });

  it('looks up checks by ID', () => {
    expect(getCheck('1.2.2')).toBe(sharedMailboxSignIn);
    expect(getCheck('0.0.0')).toBeUndefined();
  });

  it('keeps the recommendation ID in step with the check ID', () => {
    for (const check of listChecks()) {
      expect(check.metadata.RecommendationId).toBe(check.id);
    }
  });
});

// ============================================
// 1.1.3 GLOBAL ADMIN COUNT
// ============================================

describe('1.1.3 - Global administrator count', () => {
  it('passes with two user admins and ignores service principals', async () => {
    const { session } = createFakeSession({
      roleMembers: {
        [ROLE_TEMPLATES.globalAdministrator]: [
          { id: 'u1', '@odata.type': '#microsoft.graph.user', userPrincipalName: 'zoe@contoso.test' },
          { id: 'u2', userPrincipalName: 'adam@contoso.test' },
          { id: 'sp1', '@odata.type': '#microsoft.graph.servicePrincipal', displayName: 'Automation' },
        ],
      },
    });

    const result = await globalAdminCount.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{
        ResourceName: 'Global Administrator',
        AdminCount: 2,
        Admins: ['adam@contoso.test', 'zoe@contoso.test'],
        IsCompliant: true,
      }],
    });
  });

  it('fails with a single admin', async () => {
    const { session } = createFakeSession({
      roleMembers: { [ROLE_TEMPLATES.globalAdministrator]: [{ id: 'u1', displayName: 'Only Admin' }] },
    });

    const result = await globalAdminCount.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0].Admins).toEqual(['Only Admin']);
  });

  it('fails with five admins', async () => {
    const members = ['a', 'b', 'c', 'd', 'e'].map(n => ({ id: n, userPrincipalName: `${n}@contoso.test` }));
    const { session } = createFakeSession({ roleMembers: { [ROLE_TEMPLATES.globalAdministrator]: members } });

    const result = await globalAdminCount.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0].AdminCount).toBe(5);
  });

  it('fails when the role has no members', async () => {
    const { session } = createFakeSession();

    const result = await globalAdminCount.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0].AdminCount).toBe(0);
  });
});

// ============================================
// 1.2.2 SHARED MAILBOX SIGN-IN
// ============================================

describe('1.2.2 - Shared mailbox sign-in', () => {
  it('passes with a compliant finding when there are no shared mailboxes', async () => {
    const { session } = createFakeSession({ cmdlets: { 'Get-EXOMailbox': [] } });

    const wire = toWireResult(await sharedMailboxSignIn.evaluate(session));
    expect(wire).toEqual({
      status: 'Pass',
      status_id: 1,
      Details: [{ ResourceName: 'Shared mailboxes', Reason: 'No shared mailboxes found', IsCompliant: true }],
    });
  });

  it('queries shared mailboxes only', async () => {
    const { session, exchange } = createFakeSession();

    await sharedMailboxSignIn.evaluate(session);
    expect(exchange.invocations).toEqual([{
      cmdlet: 'Get-EXOMailbox',
      parameters: { RecipientTypeDetails: 'SharedMailbox', ResultSize: 'Unlimited' },
    }]);
  });

  it('passes when sign-in is blocked on every shared mailbox', async () => {
    const { session } = createFakeSession({
      cmdlets: { 'Get-EXOMailbox': [sharedMailbox('m1', 'info@contoso.test', 'Info')] },
      users: { m1: { accountEnabled: false } },
    });

    const result = await sharedMailboxSignIn.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{ ResourceName: 'info@contoso.test', DisplayName: 'Info', AccountEnabled: false, IsCompliant: true }],
    });
  });

  it('fails when any shared mailbox can sign in, listing findings by name', async () => {
    const { session } = createFakeSession({
      cmdlets: {
        'Get-EXOMailbox': [
          sharedMailbox('m2', 'sales@contoso.test'),
          sharedMailbox('m1', 'info@contoso.test', 'Info'),
        ],
      },
      users: { m1: { accountEnabled: false }, m2: { accountEnabled: true } },
    });

    const wire = toWireResult(await sharedMailboxSignIn.evaluate(session));
    expect(wire.status).toBe('Fail');
    expect(wire.status_id).toBe(3);
    expect(wire.Details).toEqual([
      { ResourceName: 'info@contoso.test', DisplayName: 'Info', AccountEnabled: false, IsCompliant: true },
      { ResourceName: 'sales@contoso.test', DisplayName: 'sales@contoso.test', AccountEnabled: true, IsCompliant: false },
    ]);
  });

  it('fails regardless of the order the service returns mailboxes in', async () => {
    const mailboxes = [
      sharedMailbox('m1', 'a@contoso.test'),
      sharedMailbox('m2', 'b@contoso.test'),
      sharedMailbox('m3', 'c@contoso.test'),
    ];
    const users = { m1: { accountEnabled: false }, m2: { accountEnabled: true }, m3: { accountEnabled: false } };

    const forward = await sharedMailboxSignIn.evaluate(
      createFakeSession({ cmdlets: { 'Get-EXOMailbox': mailboxes }, users }).session,
    );
    const reversed = await sharedMailboxSignIn.evaluate(
      createFakeSession({ cmdlets: { 'Get-EXOMailbox': [...mailboxes].reverse() }, users }).session,
    );

    expect(forward.status).toBe('Fail');
    expect(reversed).toEqual(forward);
  });

  it('reports an error with empty details when the mailbox query fails', async () => {
    const { session } = createFakeSession({
      failures: {
        'Get-EXOMailbox': new ApiRequestError('/InvokeCommand failed: connect ETIMEDOUT', '/InvokeCommand', null, null),
      },
    });

    const wire = toWireResult(await sharedMailboxSignIn.evaluate(session));
    expect(wire).toEqual({
      status: 'Error',
      status_id: 3,
      Details: [],
      Error: '/InvokeCommand failed: connect ETIMEDOUT',
    });
  });

  it('reports an error when the account behind a mailbox cannot be read', async () => {
    const { session } = createFakeSession({
      cmdlets: { 'Get-EXOMailbox': [sharedMailbox('missing', 'ghost@contoso.test')] },
    });

    const result = await sharedMailboxSignIn.evaluate(session);
    expect(result).toEqual({
      status: 'Error',
      details: [],
      error: "/users/missing failed with 404: Resource 'missing' does not exist",
    });
  });
});

// ============================================
// 1.3.1 PASSWORD EXPIRATION
// ============================================

describe('1.3.1 - Password expiration', () => {
  it('passes when every verified domain never expires passwords', async () => {
    const { session } = createFakeSession({
      domains: [
        { id: 'contoso.test', isVerified: true, passwordValidityPeriodInDays: PASSWORDS_NEVER_EXPIRE },
        { id: 'pending.test', isVerified: false, passwordValidityPeriodInDays: 90 },
      ],
    });

    const result = await passwordExpiration.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{ ResourceName: 'contoso.test', PasswordValidityPeriodInDays: PASSWORDS_NEVER_EXPIRE, IsCompliant: true }],
    });
  });

  it('fails a verified domain with an expiry period', async () => {
    const { session } = createFakeSession({
      domains: [
        { id: 'contoso.test', isVerified: true, passwordValidityPeriodInDays: PASSWORDS_NEVER_EXPIRE },
        { id: 'fabrikam.test', isVerified: true, passwordValidityPeriodInDays: 90 },
      ],
    });

    const result = await passwordExpiration.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[1]).toEqual({ ResourceName: 'fabrikam.test', PasswordValidityPeriodInDays: 90, IsCompliant: false });
  });

  it('treats a missing validity period as non-compliant', async () => {
    const { session } = createFakeSession({ domains: [{ id: 'contoso.test', isVerified: true }] });

    const result = await passwordExpiration.evaluate(session);
    expect(result.details).toEqual([{ ResourceName: 'contoso.test', PasswordValidityPeriodInDays: null, IsCompliant: false }]);
  });

  it('fails when no verified domain is returned', async () => {
    const { session } = createFakeSession({ domains: [{ id: 'pending.test', isVerified: false }] });

    const result = await passwordExpiration.evaluate(session);
    expect(result).toEqual({
      status: 'Fail',
      details: [{ ResourceName: 'Domains', Reason: 'No verified domains were returned', IsCompliant: false }],
    });
  });
});

// ============================================
// 2.1.12 CONNECTION FILTER ALLOW LIST
// ============================================

describe('2.1.12 - Connection filter IP allow list', () => {
  it('passes when the allow list is empty', async () => {
    const { session, exchange } = createFakeSession({
      cmdlets: { 'Get-HostedConnectionFilterPolicy': [{ Identity: 'Default', IPAllowList: [] }] },
    });

    const result = await connectionFilterAllowList.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{ ResourceName: 'Default', IPAllowList: [], IsCompliant: true }],
    });
    expect(exchange.invocations[0].parameters).toEqual({ Identity: 'Default' });
  });

  it('fails when addresses are allowed', async () => {
    const { session } = createFakeSession({
      cmdlets: { 'Get-HostedConnectionFilterPolicy': [{ Identity: 'Default', IPAllowList: ['192.0.2.10'] }] },
    });

    const result = await connectionFilterAllowList.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0].IPAllowList).toEqual(['192.0.2.10']);
  });

  it('treats a null allow list as empty', async () => {
    const { session } = createFakeSession({
      cmdlets: { 'Get-HostedConnectionFilterPolicy': [{ Identity: 'Default', IPAllowList: null }] },
    });

    expect((await connectionFilterAllowList.evaluate(session)).status).toBe('Pass');
  });

  it('reports an error when the default policy is missing', async () => {
    const { session } = createFakeSession();

    const result = await connectionFilterAllowList.evaluate(session);
    expect(result).toEqual({
      status: 'Error',
      details: [],
      error: "Get-HostedConnectionFilterPolicy returned no policy with identity 'Default'",
    });
  });
});

// ============================================
// 5.2.2.1 ADMIN MFA POLICY
// ============================================

describe('5.2.2.1 - MFA for administrative roles', () => {
  it('passes when an enabled policy covers every admin role', async () => {
    const { session } = createFakeSession({ conditionalAccessPolicies: [caPolicy()] });

    const result = await adminMfaPolicy.evaluate(session);
    expect(result.status).toBe('Pass');
    expect(details(result).map(d => d.ResourceName)).toEqual(['Administrative role coverage', 'Require MFA for admins']);
    expect(details(result)[0]).toEqual({
      ResourceName: 'Administrative role coverage',
      UncoveredRoles: [],
      IsCompliant: true,
    });
  });

  it('accepts an authentication strength instead of the mfa control', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [caPolicy({
        grantControls: { operator: 'OR', builtInControls: [], authenticationStrength: { id: '00000000-0000-0000-0000-000000000002' } },
      })],
    });

    expect((await adminMfaPolicy.evaluate(session)).status).toBe('Pass');
  });

  it('fails and names the roles no policy covers', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [caPolicy({
        conditions: {
          users: { includeRoles: [ROLE_TEMPLATES.globalAdministrator] },
          applications: { includeApplications: ['All'] },
        },
      })],
    });

    const result = await adminMfaPolicy.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0]).toEqual({
      ResourceName: 'Administrative role coverage',
      UncoveredRoles: [
        'Privileged Role Administrator',
        'Security Administrator',
        'Exchange Administrator',
        'SharePoint Administrator',
        'User Administrator',
        'Conditional Access Administrator',
      ],
      IsCompliant: false,
    });
    expect(details(result)[1].IncludedRoles).toEqual(['Global Administrator']);
  });

  it('does not count a role the policy excludes', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [caPolicy({
        conditions: {
          users: { includeRoles: ALL_ADMIN_ROLES, excludeRoles: [ROLE_TEMPLATES.globalAdministrator] },
          applications: { includeApplications: ['All'] },
        },
      })],
    });

    const result = await adminMfaPolicy.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0]).toEqual({
      ResourceName: 'Administrative role coverage',
      UncoveredRoles: ['Global Administrator'],
      IsCompliant: false,
    });
    expect(details(result)[1].IncludedRoles).not.toContain('Global Administrator');
    expect(details(result)[1].ExcludedRoles).toEqual(['Global Administrator']);
  });

  it('ignores a policy whose exclusions cancel every included role', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [caPolicy({
        conditions: {
          users: {
            includeRoles: [ROLE_TEMPLATES.globalAdministrator],
            excludeRoles: [ROLE_TEMPLATES.globalAdministrator],
          },
          applications: { includeApplications: ['All'] },
        },
      })],
    });

    const result = await adminMfaPolicy.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result).map(d => d.ResourceName)).toEqual(['Conditional Access']);
  });

  it('lists included roles in name order whatever order the policy gives', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [caPolicy({
        conditions: {
          users: { includeRoles: [...ALL_ADMIN_ROLES].reverse() },
          applications: { includeApplications: ['All'] },
        },
      })],
    });

    const result = await adminMfaPolicy.evaluate(session);
    expect(details(result)[1].IncludedRoles).toEqual([
      'Conditional Access Administrator',
      'Exchange Administrator',
      'Global Administrator',
      'Privileged Role Administrator',
      'Security Administrator',
      'SharePoint Administrator',
      'User Administrator',
    ]);
    expect(details(result)[1].ExcludedRoles).toEqual([]);
  });

  it('gives the same result for same-named policies in any order', async () => {
    const a = caPolicy({ id: 'a', displayName: 'Admins' });
    const b = caPolicy({ id: 'b', displayName: 'Admins' });

    const forward = await adminMfaPolicy.evaluate(createFakeSession({ conditionalAccessPolicies: [a, b] }).session);
    const reversed = await adminMfaPolicy.evaluate(createFakeSession({ conditionalAccessPolicies: [b, a] }).session);
    expect(forward).toEqual(reversed);
    expect(details(forward).map(d => d.PolicyId)).toEqual([undefined, 'a', 'b']);
  });

  it('ignores report-only policies', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [caPolicy({ state: 'enabledForReportingButNotEnforced' })],
    });

    const result = await adminMfaPolicy.evaluate(session);
    expect(result).toEqual({
      status: 'Fail',
      details: [{
        ResourceName: 'Conditional Access',
        Reason: 'No enabled policy requires MFA for administrative roles on all cloud apps',
        IsCompliant: false,
      }],
    });
  });

  it('needs manual review when the tenant lacks the licence', async () => {
    const { session } = createFakeSession({
      failures: {
        listConditionalAccessPolicies: new ApiRequestError(
          '/identity/conditionalAccess/policies failed with 403: Tenant is not licensed for this feature',
          '/identity/conditionalAccess/policies',
          403,
          'AadPremiumLicenseRequired',
        ),
      },
    });

    const wire = toWireResult(await adminMfaPolicy.evaluate(session));
    expect(wire).toEqual({
      status: 'Manual',
      status_id: 2,
      Details: [{
        ResourceName: 'Microsoft Entra ID P1',
        Reason: '/identity/conditionalAccess/policies failed with 403: Tenant is not licensed for this feature',
        IsCompliant: null,
      }],
    });
  });

  it('reports an error for a malformed policy', async () => {
    const { session } = createFakeSession({ conditionalAccessPolicies: [caPolicy({ state: 'paused' })] });

    const result = await adminMfaPolicy.evaluate(session);
    expect(result).toEqual({
      status: 'Error',
      details: [],
      error: 'state: String must be one of: enabled, disabled, enabledForReportingButNotEnforced',
    });
  });
});

// ============================================
// 5.2.2.8 MANAGED DEVICE POLICY
// ============================================

describe('5.2.2.8 - Managed device required', () => {
  const devicePolicy = caPolicy({
    id: 'policy-devices',
    displayName: 'Require managed device',
    conditions: {
      users: { includeUsers: ['All'] },
      applications: { includeApplications: ['All'] },
    },
    grantControls: { operator: 'OR', builtInControls: ['compliantDevice', 'domainJoinedDevice'] },
  });

  it('passes when an enabled policy for all users requires a managed device', async () => {
    const { session } = createFakeSession({ conditionalAccessPolicies: [devicePolicy, caPolicy()] });

    const result = await managedDevicePolicy.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{
        ResourceName: 'Require managed device',
        PolicyId: 'policy-devices',
        GrantControls: ['compliantDevice', 'domainJoinedDevice'],
        RequireDeviceCompliance: true,
        RequireHybridJoin: true,
        IsCompliant: true,
      }],
    });
  });

  it('fails when the policy is scoped to a subset of users', async () => {
    const { session } = createFakeSession({
      conditionalAccessPolicies: [{
        ...devicePolicy,
        conditions: { users: { includeUsers: ['group-1'] }, applications: { includeApplications: ['All'] } },
      }],
    });

    const result = await managedDevicePolicy.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[0].ResourceName).toBe('Conditional Access');
  });
});

// ============================================
// 5.3.1 PRIVILEGED IDENTITY MANAGEMENT
// ============================================

describe('5.3.1 - Privileged Identity Management', () => {
  it('passes when both privileged roles have eligible assignments', async () => {
    const { session } = createFakeSession({
      roleEligibilitySchedules: [
        { id: 's1', principalId: 'u1', roleDefinitionId: ROLE_TEMPLATES.globalAdministrator, status: 'Provisioned' },
        { id: 's2', principalId: 'u2', roleDefinitionId: ROLE_TEMPLATES.privilegedRoleAdministrator },
      ],
    });

    const result = await privilegedIdentityManagement.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [
        { ResourceName: 'Global Administrator', EligibleAssignments: 1, IsCompliant: true },
        { ResourceName: 'Privileged Role Administrator', EligibleAssignments: 1, IsCompliant: true },
      ],
    });
  });

  it('fails a role with no provisioned eligibility', async () => {
    const { session } = createFakeSession({
      roleEligibilitySchedules: [
        { id: 's1', principalId: 'u1', roleDefinitionId: ROLE_TEMPLATES.globalAdministrator, status: 'Provisioned' },
        { id: 's2', principalId: 'u2', roleDefinitionId: ROLE_TEMPLATES.privilegedRoleAdministrator, status: 'Revoked' },
      ],
    });

    const result = await privilegedIdentityManagement.evaluate(session);
    expect(result.status).toBe('Fail');
    expect(details(result)[1]).toEqual({
      ResourceName: 'Privileged Role Administrator',
      EligibleAssignments: 0,
      IsCompliant: false,
    });
  });

  it('needs manual review when the tenant has no P2 licence', async () => {
    const { session } = createFakeSession({
      failures: {
        listRoleEligibilitySchedules: new ApiRequestError(
          '/roleManagement/directory/roleEligibilitySchedules failed with 403: The tenant needs an AAD Premium 2 license.',
          '/roleManagement/directory/roleEligibilitySchedules',
          403,
          'AadPremiumLicenseRequired',
        ),
      },
    });

    const wire = toWireResult(await privilegedIdentityManagement.evaluate(session));
    expect(wire.status).toBe('Manual');
    expect(wire.status_id).toBe(2);
    expect(wire.Details).toEqual([{
      ResourceName: 'Microsoft Entra ID P2',
      Reason: '/roleManagement/directory/roleEligibilitySchedules failed with 403: The tenant needs an AAD Premium 2 license.',
      IsCompliant: null,
    }]);
  });

  it('is an L2 control', () => {
    expect(privilegedIdentityManagement.metadata.Level).toBe('L2');
  });
});

// ============================================
// 7.2.3 SHAREPOINT EXTERNAL SHARING
// ============================================

describe('7.2.3 - SharePoint external sharing', () => {
  it('passes when sharing is limited to existing guests', async () => {
    const { session } = createFakeSession({ sharePointSettings: { sharingCapability: 'existingExternalUserSharingOnly' } });

    const result = await sharePointExternalSharing.evaluate(session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{ ResourceName: 'SharePoint tenant', SharingCapability: 'existingExternalUserSharingOnly', IsCompliant: true }],
    });
  });

  it('fails when anyone links are allowed', async () => {
    const { session } = createFakeSession({ sharePointSettings: { sharingCapability: 'externalUserAndGuestSharing' } });

    expect((await sharePointExternalSharing.evaluate(session)).status).toBe('Fail');
  });

  it('reports an error when the settings response is missing', async () => {
    const { session } = createFakeSession();

    const result = await sharePointExternalSharing.evaluate(session);
    expect(result).toEqual({ status: 'Error', details: [], error: 'Expected object' });
  });
});

// ============================================
// 9.1.1 FABRIC GUEST ACCESS
// ============================================

describe('9.1.1 - Fabric guest access', () => {
  function withSetting(enabled: boolean) {
    return createFakeSession({
      fabric: {
        '/admin/tenantsettings': {
          tenantSettings: [
            { settingName: 'PublishToWeb', enabled: false },
            { settingName: GUEST_ACCESS_SETTING, title: 'Guest users can access Microsoft Fabric', enabled },
          ],
        },
      },
    });
  }

  it('passes when guest access is disabled', async () => {
    const result = await powerBiGuestAccess.evaluate(withSetting(false).session);
    expect(result).toEqual({
      status: 'Pass',
      details: [{
        ResourceName: GUEST_ACCESS_SETTING,
        Title: 'Guest users can access Microsoft Fabric',
        Enabled: false,
        IsCompliant: true,
      }],
    });
  });

  it('fails when guest access is enabled', async () => {
    expect((await powerBiGuestAccess.evaluate(withSetting(true).session)).status).toBe('Fail');
  });

  it('needs manual review when the setting is absent', async () => {
    const { session } = createFakeSession({ fabric: { '/admin/tenantsettings': { tenantSettings: [] } } });

    const result = await powerBiGuestAccess.evaluate(session);
    expect(result).toEqual({
      status: 'Manual',
      details: [{
        ResourceName: GUEST_ACCESS_SETTING,
        Reason: 'Setting not present in the tenant settings response',
        IsCompliant: null,
      }],
    });
  });
});
