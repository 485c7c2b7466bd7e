/**
 * Host port allocation for agent containers.
 *
 * Scan-then-pick: ask the runtime which host ports running containers hold,
 * return the lowest free port in the configured range. No lock spans the
 * scan and the subsequent create, so two concurrent creates can pick the
 * same port; the loser's create fails with a port conflict and can retry.
 */

import type { RuntimeDriver } from './runtime.js';
import { createLogger } from '../logger.js';
import { ErrorCode } from '../../types/errors.js';

const logger = createLogger('port-allocator');

export interface PortRange {
  /** Inclusive. */
  start: number;
  /** Inclusive. */
  end: number;
}

export interface PortAllocatorOptions {
  driver: RuntimeDriver;
  range: PortRange;
  /** Uniform [0, 1) source for the exhausted-range fallback. */
  random?: () => number;
}

export class PortAllocator {
  private readonly driver: RuntimeDriver;
  private readonly range: PortRange;
  private readonly random: () => number;

  constructor(options: PortAllocatorOptions) {
    const { start, end } = options.range;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 1 || end > 65535) {
      throw new RangeError(`Port range must be integers within 1-65535, got ${start}-${end}`);
    }
    if (start > end) {
      throw new RangeError(`Port range start ${start} is greater than end ${end}`);
    }
    this.driver = options.driver;
    this.range = { start, end };
    this.random = options.random ?? Math.random;
  }

  get portRange(): PortRange {
    return { ...this.range };
  }

  /**
   * Pick a host port. Always inside the range; falls back to a random
   * port (which may collide) when the range is full or the runtime
   * cannot list bindings.
   */
  async allocate(): Promise<number> {
    const bindings = await this.driver.listPortBindings();
    if (!bindings.ok) {
      logger.warn('cannot list port bindings, picking at random', {
        error_code: ErrorCode.PORT_EXHAUSTED,
        error: bindings.error,
      });
      return this.randomPort();
    }

    const used = new Set(bindings.value);
    for (let port = this.range.start; port <= this.range.end; port++) {
      if (!used.has(port)) return port;
    }

    const port = this.randomPort();
    logger.warn('port range exhausted, picking at random', {
      error_code: ErrorCode.PORT_EXHAUSTED,
      start: this.range.start,
      end: this.range.end,
      port,
    });
    return port;
  }

  private randomPort(): number {
    const size = this.range.end - this.range.start + 1;
    const offset = Math.min(Math.floor(this.random() * size), size - 1);
    return this.range.start + Math.max(0, offset);
  }
}
