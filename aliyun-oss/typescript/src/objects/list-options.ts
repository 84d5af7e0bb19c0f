/**
 * Fluent builder for listing options
 * @module @oss-integrations/aliyun-oss/objects/list-options
 */

import type { ListOptions } from '../types/index.js';
import { assertMaxKeys } from '../request/index.js';

/**
 * @example
 * ```typescript
 * const options = new ListOptionsBuilder().prefix('logs/').maxKeys(50).build();
 * ```
 */
export class ListOptionsBuilder {
  private options: { -readonly [K in keyof ListOptions]: ListOptions[K] } = {};

  prefix(prefix: string): this {
    this.options.prefix = prefix;
    return this;
  }

  /**
   * Continuation token from a previous page's `nextMarker`
   */
  marker(marker: string): this {
    this.options.marker = marker;
    return this;
  }

  delimiter(delimiter: string): this {
    this.options.delimiter = delimiter;
    return this;
  }

  /**
   * @throws {ConfigError} If `n` is outside 1-1000
   */
  maxKeys(n: number): this {
    assertMaxKeys(n);
    this.options.maxKeys = n;
    return this;
  }

  build(): ListOptions {
    return { ...this.options };
  }
}
