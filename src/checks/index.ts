import { ComplianceCheck } from '../service/compliance-check';
import { adminMfaPolicy } from './admin-mfa-policy';
import { connectionFilterAllowList } from './connection-filter-allow-list';
import { globalAdminCount } from './global-admin-count';
import { managedDevicePolicy } from './managed-device-policy';
import { passwordExpiration } from './password-expiration';
import { powerBiGuestAccess } from './power-bi-guest-access';
import { privilegedIdentityManagement } from './privileged-identity-management';
import { sharedMailboxSignIn } from './shared-mailbox-sign-in';
import { sharePointExternalSharing } from './sharepoint-external-sharing';

const CHECKS: readonly ComplianceCheck[] = [
  globalAdminCount,
  sharedMailboxSignIn,
  passwordExpiration,
  connectionFilterAllowList,
  adminMfaPolicy,
  managedDevicePolicy,
  privilegedIdentityManagement,
  sharePointExternalSharing,
  powerBiGuestAccess,
];

export function listChecks(): ComplianceCheck[] {
  return [...CHECKS];
}

export function getCheck(id: string): ComplianceCheck | undefined {
  return CHECKS.find(c => c.id === id);
}

export {
  adminMfaPolicy,
  connectionFilterAllowList,
  globalAdminCount,
  managedDevicePolicy,
  passwordExpiration,
  powerBiGuestAccess,
  privilegedIdentityManagement,
  sharedMailboxSignIn,
  sharePointExternalSharing,
};
