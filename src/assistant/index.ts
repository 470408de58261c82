/**
 * Assistant Module
 *
 * OpenAI assistant threads as ledger sessions.
 */

import * as Client from './client';

export type AssistantClient = Client.ClientInstance;
export type { AssistantApi, AssistantConfig, CreateAssistantOptions } from './client';

export const create = Client.create;
export const isThreadMissing = Client.isThreadMissing;
