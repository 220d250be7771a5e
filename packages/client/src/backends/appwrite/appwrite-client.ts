import { Account, Client, Databases } from 'node-appwrite';
import { info } from 'firebase-functions/logger';
import type { AppwriteConfig } from '../../config/app-config.js';

/**
 * The pieces every Appwrite service needs: one database and the account API
 * of the same client.
 */
export interface AppwriteContext {
  client: Client;
  databases: Databases;
  account: Account;
  databaseId: string;
}

export type AppwriteDatabase = Pick<AppwriteContext, 'databases' | 'databaseId'>;

export function createAppwriteContext(config: AppwriteConfig): AppwriteContext {
  const client = new Client().setEndpoint(config.endpoint).setProject(config.projectId);
  if (config.apiKey !== undefined) {
    client.setKey(config.apiKey);
  }
  info('Appwrite client created', { endpoint: config.endpoint, projectId: config.projectId });
  return {
    client,
    databases: new Databases(client),
    account: new Account(client),
    databaseId: config.databaseId,
  };
}
