/**
 * Ensures the bridge network agent containers join exists.
 *
 * The first successful `ensure()` is remembered for the life of the
 * process; a failure is not, so the next create tries again.
 */

import type { DriverResult, RuntimeDriver } from './runtime.js';
import { driverOk } from './runtime.js';
import { createLogger } from '../logger.js';

const logger = createLogger('network');

export class NetworkManager {
  readonly networkName: string;
  private readonly driver: RuntimeDriver;
  private ready = false;
  private pending: Promise<DriverResult<void>> | null = null;

  constructor(driver: RuntimeDriver, networkName: string) {
    this.driver = driver;
    this.networkName = networkName;
  }

  /** Create the network if needed. Concurrent callers share one attempt. */
  async ensure(): Promise<DriverResult<void>> {
    if (this.ready) return driverOk(undefined);
    if (this.pending) return this.pending;

    this.pending = this.driver.ensureNetwork(this.networkName).then((result) => {
      this.pending = null;
      if (result.ok) {
        this.ready = true;
      } else {
        logger.warn('network setup failed', { network: this.networkName, error: result.error });
      }
      return result;
    });
    return this.pending;
  }

  get isReady(): boolean {
    return this.ready;
  }
}
