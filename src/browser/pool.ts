/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pool.ts: Fixed-size pool of isolated browser sessions for StreamFetch.
 */
import type { BrowserDriver, BrowserLauncher, BrowserSession, Nullable } from "../types/index.js";
import { ExtractionCancelledError, NavigationError, PoolExhaustedError } from "../extraction/errors.js";
import { LOG, TimeoutError, formatError, raceWithTimeout } from "../utils/index.js";

/* The pool owns a fixed number of slots, each holding at most one browser. A slot is in exactly one of three places at any moment: the idle queue, leased to one
 * extraction, or being recycled after a release. Callers that find no idle slot wait in a FIFO queue; a released slot goes straight to the longest waiting caller
 * so that nobody is overtaken by a later arrival.
 *
 * Recycling happens on release, before the slot is visible to anyone else. A connected browser that answers a protocol round-trip within healthCheckTimeout gets
 * a fresh browser context. Anything else (disconnected, wedged, or a reset that failed) is closed and replaced with a newly launched browser. A launch that fails
 * leaves the slot empty; the next lease of that slot launches lazily, bounded by the caller's acquire timeout and signal.
 */

export interface BrowserPoolOptions {

  // Bound for the liveness probe and for the context reset, each.
  healthCheckTimeout: number;

  launcher: BrowserLauncher;
  size: number;
}

export interface PoolStats {

  available: number;
  leased: number;
  size: number;
  waiting: number;
}

interface PoolSlot {

  driver: Nullable<BrowserDriver>;
  index: number;
  leaseId: Nullable<number>;
}

interface PoolWaiter {

  reject: (error: Error) => void;
  resolve: (slot: PoolSlot) => void;
}

export class BrowserSessionPool {

  private readonly idle: PoolSlot[];
  private nextLeaseId: number;
  private readonly options: BrowserPoolOptions;
  private readonly slots: PoolSlot[];
  private stopped: boolean;
  private readonly waiters: PoolWaiter[];

  constructor(options: BrowserPoolOptions) {

    this.options = options;
    this.nextLeaseId = 1;
    this.stopped = false;
    this.waiters = [];
    this.slots = Array.from({ length: options.size }, (_, index) => ({ driver: null, index, leaseId: null }));
    this.idle = [...this.slots];
  }

  /**
   * Launches a browser in every slot. Launch failures are logged and leave the slot empty for a lazy retry.
   * @returns The number of browsers that launched.
   */
  async start(): Promise<number> {

    const results = await Promise.allSettled(this.slots.map(async (slot) => {

      slot.driver = await this.options.launcher(slot.index);
    }));

    let launched = 0;

    for(const [ index, result ] of results.entries()) {

      if(result.status === "fulfilled") {

        launched++;

        continue;
      }

      LOG.warn("Unable to launch the browser for pool slot %s: %s.", index, formatError(result.reason));
    }

    LOG.debug("browser:pool", "Pool started with %s of %s browsers.", launched, this.slots.length);

    return launched;
  }

  /**
   * Leases a session, waiting in FIFO order when every slot is busy.
   * @param timeoutMs - How long to wait for a free slot.
   * @param signal - Aborting removes the caller from the queue.
   * @returns An exclusive session.
   * @throws PoolExhaustedError when no slot frees up in time, ExtractionCancelledError on abort or shutdown, NavigationError when the browser cannot launch.
   */
  async acquire(timeoutMs: number, signal?: AbortSignal): Promise<BrowserSession> {

    if(this.stopped) {

      throw new ExtractionCancelledError("The browser pool is shutting down.");
    }

    if(signal?.aborted) {

      throw new ExtractionCancelledError();
    }

    const slot = this.idle.shift() ?? await this.enqueue(timeoutMs, signal);

    return this.lease(slot, timeoutMs, signal);
  }

  /**
   * Returns a leased session to the pool. The browser is health checked and either reset or replaced before the slot is handed on.
   * @param session - The session returned by acquire().
   */
  async release(session: BrowserSession): Promise<void> {

    const slot = this.slots.at(session.slot);

    if(!slot || (slot.leaseId === null) || (slot.leaseId !== session.leaseId)) {

      LOG.warn("Ignoring release of browser session %s in slot %s: it is not currently leased.", session.leaseId, session.slot);

      return;
    }

    slot.leaseId = null;

    await this.recycle(slot);

    this.handOff(slot);
  }

  /**
   * Number of slots whose browser is currently connected, whether idle or leased.
   */
  healthy(): number {

    return this.slots.filter((slot) => slot.driver?.isConnected() ?? false).length;
  }

  stats(): PoolStats {

    return {

      available: this.idle.length,
      leased: this.slots.filter((slot) => slot.leaseId !== null).length,
      size: this.slots.length,
      waiting: this.waiters.length
    };
  }

  /**
   * Shuts the pool down: pending waiters are rejected and idle browsers closed. Leased browsers are closed when their lease is released.
   */
  async stop(): Promise<void> {

    this.stopped = true;

    for(const waiter of this.waiters.splice(0)) {

      waiter.reject(new ExtractionCancelledError("The browser pool is shutting down."));
    }

    await Promise.all(this.idle.map(async (slot) => this.discard(slot)));
  }

  private async enqueue(timeoutMs: number, signal?: AbortSignal): Promise<PoolSlot> {

    LOG.debug("browser:pool", "No idle browser session, waiting (%s already queued).", this.waiters.length);

    return new Promise<PoolSlot>((resolve, reject) => {

      const onAbort = (): void => {

        finish();
        reject(new ExtractionCancelledError());
      };

      const timer = setTimeout(() => {

        finish();
        reject(new PoolExhaustedError(timeoutMs));
      }, timeoutMs);

      const waiter: PoolWaiter = {

        reject: (error: Error): void => {

          finish();
          reject(error);
        },
        resolve: (slot: PoolSlot): void => {

          finish();
          resolve(slot);
        }
      };

      const finish = (): void => {

        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);

        const position = this.waiters.indexOf(waiter);

        if(position !== -1) {

          this.waiters.splice(position, 1);
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  // Marks a slot leased, launching its browser first when the slot is empty.
  private async lease(slot: PoolSlot, timeoutMs: number, signal?: AbortSignal): Promise<BrowserSession> {

    const leaseId = this.nextLeaseId++;

    slot.leaseId = leaseId;

    if(!slot.driver) {

      const launching = this.options.launcher(slot.index);

      try {

        slot.driver = await raceWithTimeout(launching, { description: "Browser launch", signal, timeoutMs });
      } catch(error) {

        slot.leaseId = null;
        this.handOff(slot);

        if(signal?.aborted || (error instanceof TimeoutError)) {

          this.closeAbandonedLaunch(launching, slot.index);
        }

        if(signal?.aborted) {

          throw new ExtractionCancelledError();
        }

        throw new NavigationError("browser", true, [ "unable to launch a browser: ", formatError(error) ].join(""), { cause: error });
      }
    }

    LOG.debug("browser:pool", "Leased browser session %s in slot %s.", leaseId, slot.index);

    return { driver: slot.driver, leaseId, slot: slot.index };
  }

  // A launch nobody waits for any more may still succeed. Its browser belongs to no slot and is closed.
  private closeAbandonedLaunch(launching: Promise<BrowserDriver>, index: number): void {

    void launching.then(async (driver) => {

      LOG.debug("browser:pool", "Closing a browser for slot %s that finished launching after its lease gave up.", index);

      await driver.close();
    }).catch((error: unknown) => {

      LOG.debug("browser:pool", "Abandoned browser launch for slot %s failed: %s.", index, formatError(error));
    });
  }

  // Gives a free slot to the longest waiting caller, or back to the idle queue.
  private handOff(slot: PoolSlot): void {

    if(this.stopped) {

      return;
    }

    const waiter = this.waiters.at(0);

    if(waiter) {

      waiter.resolve(slot);

      return;
    }

    this.idle.push(slot);
  }

  private async recycle(slot: PoolSlot): Promise<void> {

    if(this.stopped) {

      await this.discard(slot);

      return;
    }

    const driver = slot.driver;

    if(!driver) {

      return;
    }

    if(await this.isHealthy(driver, slot.index)) {

      try {

        await raceWithTimeout(driver.reset(), { description: "Browser context reset", timeoutMs: this.options.healthCheckTimeout });

        LOG.debug("browser:pool", "Reset browser session in slot %s.", slot.index);

        return;
      } catch(error) {

        LOG.warn("Unable to reset the browser session in slot %s: %s. Replacing it.", slot.index, formatError(error));
      }
    } else {

      LOG.warn("Browser session in slot %s is unresponsive. Replacing it.", slot.index);
    }

    await this.discard(slot);

    try {

      slot.driver = await this.options.launcher(slot.index);
    } catch(error) {

      LOG.warn("Unable to relaunch the browser for pool slot %s: %s. It will be retried on the next lease.", slot.index, formatError(error));
    }
  }

  private async isHealthy(driver: BrowserDriver, index: number): Promise<boolean> {

    if(!driver.isConnected()) {

      return false;
    }

    try {

      return await raceWithTimeout(driver.isResponsive(), { description: "Browser health check", timeoutMs: this.options.healthCheckTimeout });
    } catch(error) {

      LOG.debug("browser:pool", "Health check for slot %s failed: %s.", index, formatError(error));

      return false;
    }
  }

  // Closes a slot's browser, if any, and leaves the slot empty.
  private async discard(slot: PoolSlot): Promise<void> {

    const driver = slot.driver;

    slot.driver = null;

    if(!driver) {

      return;
    }

    try {

      await driver.close();
    } catch(error) {

      LOG.debug("browser:pool", "Error closing the browser in slot %s: %s.", slot.index, formatError(error));
    }
  }
}
