// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import path from 'node:path';
import {Duration} from './time/duration.js';

// -------------------- kubewalk related constants -------------------------------------------------------------------
export const KUBEWALK_HOME_DIR = process.env.KUBEWALK_HOME || path.join(os.homedir(), '.kubewalk');
export const KUBEWALK_LOG_FILE = 'kubewalk.log';
export const KUBEWALK_CONFIG_FILE = 'config.yaml';
export const KUBEWALK_ENV_PREFIX = 'KUBEWALK_';

// -------------------- tunables ----------------------------------------------------------------------------------------
export const DEFAULT_REFRESH_INTERVAL = Duration.ofSeconds(30);
export const DEFAULT_CANCEL_GRACE_PERIOD = Duration.ofSeconds(2);
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF = Duration.ofMillis(250);
export const DEFAULT_LOG_LEVEL = 'info';

// network error codes treated as transient for idempotent reads
export const TRANSIENT_NETWORK_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'ESOCKETTIMEDOUT',
  'EAI_AGAIN',
];

// -------------------- kubernetes related constants ---------------------------------------------------------------------
export const POD_PHASE_RUNNING = 'Running';
export const POD_PHASE_UNKNOWN = 'Unknown';
export const NODE_CONDITION_READY = 'Ready';
export const CONDITION_STATUS_TRUE = 'True';
