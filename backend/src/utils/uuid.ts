/**
 * Ids and timestamps for sessions and attempts.
 */

import { v4 as uuidv4 } from 'uuid';

const prefixed = (prefix: string): string => `${prefix}_${uuidv4()}`;

export const generateSessionId = (): string => prefixed('session');

export const generateAttemptId = (): string => prefixed('attempt');

export const getCurrentTimestamp = (): string => new Date().toISOString();
