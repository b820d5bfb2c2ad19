// Built-in directory role template IDs
export const ROLE_TEMPLATES = {
  globalAdministrator: '62e90394-69f5-4237-9190-012177145e10',
  privilegedRoleAdministrator: 'e8611ab8-c189-46e8-94e1-60213ab1f814',
  securityAdministrator: '194ae4cb-b126-40b2-bd5b-6091b380977d',
  exchangeAdministrator: '29232cdf-9323-42fd-ade2-1d097af3e4de',
  sharePointAdministrator: 'f28a1f50-f6e7-4571-818b-6a12f2af6b6c',
  userAdministrator: 'fe930be7-5e62-47db-91af-98c3a49a38b1',
  conditionalAccessAdministrator: 'b1be1c3e-b65d-4f19-8427-f6fa0d97feb9',
} as const;

export const ROLE_NAMES: Record<string, string> = {
  [ROLE_TEMPLATES.globalAdministrator]: 'Global Administrator',
  [ROLE_TEMPLATES.privilegedRoleAdministrator]: 'Privileged Role Administrator',
  [ROLE_TEMPLATES.securityAdministrator]: 'Security Administrator',
  [ROLE_TEMPLATES.exchangeAdministrator]: 'Exchange Administrator',
  [ROLE_TEMPLATES.sharePointAdministrator]: 'SharePoint Administrator',
  [ROLE_TEMPLATES.userAdministrator]: 'User Administrator',
  [ROLE_TEMPLATES.conditionalAccessAdministrator]: 'Conditional Access Administrator',
};

export function roleName(templateId: string): string {
  return ROLE_NAMES[templateId] ?? templateId;
}
