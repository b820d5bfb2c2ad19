import { Validator } from '../security';
import { RestClient } from './rest-client';

export type CmdletParameter = string | number | boolean | string[];

// Mail and collaboration administration queries (Exchange Online admin API)
export interface ExchangeClient {
  invokeCommand<T>(cmdletName: string, parameters: Record<string, CmdletParameter>, item: Validator<T>): Promise<T[]>;
  getPolicy<T>(cmdletName: string, identity: string, item: Validator<T>): Promise<T>;
  listPolicies<T>(cmdletName: string, item: Validator<T>): Promise<T[]>;
}

const READ_ONLY_CMDLET = /^Get-[A-Za-z]+$/;

export class ExchangeAdminClient implements ExchangeClient {
  constructor(private rest: RestClient) {}

  async invokeCommand<T>(
    cmdletName: string,
    parameters: Record<string, CmdletParameter>,
    item: Validator<T>,
  ): Promise<T[]> {
    if (!READ_ONLY_CMDLET.test(cmdletName)) {
      throw new Error(`Refusing to invoke ${cmdletName}: only Get- cmdlets are allowed`);
    }

    return this.rest.postQuery('/InvokeCommand', {
      CmdletInput: {
        CmdletName: cmdletName,
        Parameters: parameters
      }
    }, item);
  }

  async getPolicy<T>(cmdletName: string, identity: string, item: Validator<T>): Promise<T> {
    const rows = await this.invokeCommand(cmdletName, { Identity: identity }, item);
    if (rows.length === 0) {
      throw new Error(`${cmdletName} returned no policy with identity '${identity}'`);
    }
    return rows[0];
  }

  listPolicies<T>(cmdletName: string, item: Validator<T>): Promise<T[]> {
    return this.invokeCommand(cmdletName, {}, item);
  }
}
