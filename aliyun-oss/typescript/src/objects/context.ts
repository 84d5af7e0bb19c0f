/**
 * Shared state of object operations
 * @module @oss-integrations/aliyun-oss/objects/context
 */

import type { NormalizedOssConfig } from '../config/index.js';
import type { HttpTransport } from '../transport/index.js';
import type { OssSigner } from '../signing/index.js';
import type { Logger } from '../observability/index.js';
import type { Clock } from '../types/index.js';

/**
 * Everything an operation needs besides its own arguments. Never mutated:
 * a client for another bucket gets a new context.
 */
export interface ObjectsContext {
  readonly config: NormalizedOssConfig;
  readonly transport: HttpTransport;
  readonly signer: OssSigner;
  readonly logger: Logger;
  readonly clock: Clock;
}
