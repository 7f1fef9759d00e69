import { GetParameterCommand, SSMClient } from "@aws-sdk/client-ssm";
import type { ParameterStore } from "../types/contracts";

export interface SsmParameterStoreOptions {
  region?: string;
  client?: SSMClient;
}

/**
 * Reads parameters from AWS SSM Parameter Store. SecureString values are
 * decrypted when `isSecret` is set.
 */
export class SsmParameterStore implements ParameterStore {
  private readonly client: SSMClient;

  constructor(options: SsmParameterStoreOptions = {}) {
    this.client = options.client ?? new SSMClient({ region: options.region });
  }

  async get(name: string, isSecret: boolean): Promise<string> {
    const result = await this.client.send(
      new GetParameterCommand({ Name: name, WithDecryption: isSecret })
    );
    const value = result.Parameter?.Value;
    if (!value) {
      throw new Error(`SSM parameter ${name} has no value.`);
    }
    return value;
  }
}
