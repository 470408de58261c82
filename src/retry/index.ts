/**
 * Retry System
 *
 * Exponential backoff for transient stage failures. Permanent failures are
 * never retried.
 */

import * as Policy from './policy';

export type RetryPolicy = Policy.PolicyInstance;

export const create = Policy.create;

export * from './types';
