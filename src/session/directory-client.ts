import { Validator } from '../security';
import { QueryParams, ReadOnlyRestClient } from './rest-client';

export interface UserQuery {
  select: string[];
  filter?: string;
}

// Directory and identity queries against Microsoft Graph
export interface DirectoryClient {
  listUsers<T>(query: UserQuery, item: Validator<T>): Promise<T[]>;
  getUser<T>(id: string, select: string[], schema: Validator<T>): Promise<T>;
  listDomains<T>(item: Validator<T>): Promise<T[]>;
  listConditionalAccessPolicies<T>(item: Validator<T>): Promise<T[]>;
  listDirectoryRoleMembers<T>(roleTemplateId: string, item: Validator<T>): Promise<T[]>;
  listRoleEligibilitySchedules<T>(item: Validator<T>): Promise<T[]>;
  getSharePointSettings<T>(schema: Validator<T>): Promise<T>;
}

export class GraphDirectoryClient implements DirectoryClient {
  constructor(private graph: ReadOnlyRestClient) {}

  listUsers<T>(query: UserQuery, item: Validator<T>): Promise<T[]> {
    const params: QueryParams = { $select: query.select.join(',') };
    if (query.filter) {
      params.$filter = query.filter;
    }
    return this.graph.list('/users', item, params);
  }

  getUser<T>(id: string, select: string[], schema: Validator<T>): Promise<T> {
    return this.graph.get(`/users/${encodeURIComponent(id)}`, schema, { $select: select.join(',') });
  }

  listDomains<T>(item: Validator<T>): Promise<T[]> {
    return this.graph.list('/domains', item);
  }

  listConditionalAccessPolicies<T>(item: Validator<T>): Promise<T[]> {
    return this.graph.list('/identity/conditionalAccess/policies', item);
  }

  listDirectoryRoleMembers<T>(roleTemplateId: string, item: Validator<T>): Promise<T[]> {
    return this.graph.list(`/directoryRoles(roleTemplateId='${encodeURIComponent(roleTemplateId)}')/members`, item);
  }

  listRoleEligibilitySchedules<T>(item: Validator<T>): Promise<T[]> {
    return this.graph.list('/roleManagement/directory/roleEligibilitySchedules', item);
  }

  getSharePointSettings<T>(schema: Validator<T>): Promise<T> {
    return this.graph.get('/admin/sharepoint/settings', schema);
  }
}
