/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pool.test.ts: Tests for the browser session pool.
 */
import { ExtractionCancelledError, NavigationError, PoolExhaustedError } from "../../src/extraction/errors.js";
import { describe, expect, it, vi } from "vitest";
import { BrowserSessionPool } from "../../src/browser/pool.js";
import { FakeDriver } from "../helpers/fakeBrowser.js";
import type { Mock } from "vitest";

interface PoolFixture {

  drivers: FakeDriver[];
  launcher: Mock<() => Promise<FakeDriver>>;
  pool: BrowserSessionPool;
}

function createPool(size: number): PoolFixture {

  const drivers: FakeDriver[] = [];
  const launcher = vi.fn(async (): Promise<FakeDriver> => {

    const driver = new FakeDriver();

    drivers.push(driver);

    return driver;
  });

  return { drivers, launcher, pool: new BrowserSessionPool({ healthCheckTimeout: 100, launcher, size }) };
}

describe("BrowserSessionPool", () => {

  it("should launch a browser per slot on start", async () => {

    const { launcher, pool } = createPool(2);

    expect(await pool.start()).toBe(2);
    expect(launcher).toHaveBeenCalledTimes(2);
    expect(pool.healthy()).toBe(2);
    expect(pool.stats()).toEqual({ available: 2, leased: 0, size: 2, waiting: 0 });
  });

  it("should lease each slot to one caller at a time", async () => {

    const { pool } = createPool(2);

    await pool.start();

    const first = await pool.acquire(100);
    const second = await pool.acquire(100);

    expect(first.slot).not.toBe(second.slot);
    expect(first.driver).not.toBe(second.driver);
    expect(pool.stats()).toEqual({ available: 0, leased: 2, size: 2, waiting: 0 });
  });

  it("should hand released slots to waiters in arrival order", async () => {

    const { pool } = createPool(1);

    await pool.start();

    const held = await pool.acquire(100);
    const order: string[] = [];
    const firstWaiter = pool.acquire(1000).then((session) => {

      order.push("first");

      return session;
    });
    const secondWaiter = pool.acquire(1000).then((session) => {

      order.push("second");

      return session;
    });

    expect(pool.stats().waiting).toBe(2);

    await pool.release(held);

    const firstSession = await firstWaiter;

    expect(order).toEqual(["first"]);

    await pool.release(firstSession);
    await secondWaiter;

    expect(order).toEqual([ "first", "second" ]);
  });

  it("should fail with PoolExhausted when no slot frees up in time", async () => {

    const { pool } = createPool(1);

    await pool.start();
    await pool.acquire(100);

    await expect(pool.acquire(20)).rejects.toThrow(PoolExhaustedError);
    expect(pool.stats().waiting).toBe(0);
  });

  it("should remove a waiter whose signal aborts", async () => {

    const { pool } = createPool(1);
    const controller = new AbortController();

    await pool.start();
    await pool.acquire(100);

    const waiting = pool.acquire(60000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toThrow(ExtractionCancelledError);
    expect(pool.stats().waiting).toBe(0);
  });

  it("should reset a healthy browser on release and reuse it", async () => {

    const { drivers, launcher, pool } = createPool(1);

    await pool.start();

    const session = await pool.acquire(100);

    await pool.release(session);

    expect(drivers[0].resets).toBe(1);
    expect(launcher).toHaveBeenCalledTimes(1);
    expect((await pool.acquire(100)).driver).toBe(drivers[0]);
  });

  it("should not carry cookies from one lease into the next", async () => {

    const { pool } = createPool(1);
    const cookie = { domain: "media.example.com", expires: 0, httpOnly: true, name: "SID", path: "/", secure: true, value: "test-secret" };

    await pool.start();

    const first = await pool.acquire(100);
    const page = await first.driver.newPage();

    await page.setCookies([cookie]);

    expect(await (await first.driver.newPage()).cookies(["https://media.example.com/"])).toEqual([cookie]);

    await pool.release(first);

    const second = await pool.acquire(100);

    expect(second.driver).toBe(first.driver);
    expect(await (await second.driver.newPage()).cookies(["https://media.example.com/"])).toEqual([]);
  });

  it("should replace an unresponsive browser on release", async () => {

    const { drivers, launcher, pool } = createPool(1);

    await pool.start();

    const session = await pool.acquire(100);

    drivers[0].responsive = false;

    await pool.release(session);

    expect(drivers[0].closed).toBe(true);
    expect(launcher).toHaveBeenCalledTimes(2);
    expect((await pool.acquire(100)).driver).toBe(drivers[1]);
  });

  it("should replace a disconnected browser on release", async () => {

    const { drivers, pool } = createPool(1);

    await pool.start();

    const session = await pool.acquire(100);

    drivers[0].connected = false;

    expect(pool.healthy()).toBe(0);

    await pool.release(session);

    expect(drivers[0].resets).toBe(0);
    expect(pool.healthy()).toBe(1);
  });

  it("should ignore a second release of the same lease", async () => {

    const { drivers, pool } = createPool(1);

    await pool.start();

    const session = await pool.acquire(100);

    await pool.release(session);
    await pool.release(session);

    expect(drivers[0].resets).toBe(1);
    expect(pool.stats()).toEqual({ available: 1, leased: 0, size: 1, waiting: 0 });
  });

  it("should launch lazily when start could not launch a browser", async () => {

    const driver = new FakeDriver();
    const launcher = vi.fn<() => Promise<FakeDriver>>().mockRejectedValueOnce(new Error("no chrome")).mockResolvedValue(driver);
    const pool = new BrowserSessionPool({ healthCheckTimeout: 100, launcher, size: 1 });

    expect(await pool.start()).toBe(0);
    expect((await pool.acquire(100)).driver).toBe(driver);
  });

  it("should report a failed lazy launch as a retryable navigation error and free the slot", async () => {

    const launcher = vi.fn<() => Promise<FakeDriver>>().mockRejectedValue(new Error("no chrome"));
    const pool = new BrowserSessionPool({ healthCheckTimeout: 100, launcher, size: 1 });

    await pool.start();

    const failure = pool.acquire(100);

    await expect(failure).rejects.toThrow(NavigationError);
    await expect(failure).rejects.toMatchObject({ reason: "browser", retryable: true });
    expect(pool.stats()).toEqual({ available: 1, leased: 0, size: 1, waiting: 0 });
  });

  it("should bound a lazy launch by the acquire timeout and close the browser when it arrives", async () => {

    const late = new FakeDriver();
    let finishLaunch = (_driver: FakeDriver): void => undefined;
    const launcher = vi.fn<() => Promise<FakeDriver>>().mockRejectedValueOnce(new Error("no chrome")).mockImplementation(async () => new Promise<FakeDriver>((resolve) => {

      finishLaunch = resolve;
    }));
    const pool = new BrowserSessionPool({ healthCheckTimeout: 100, launcher, size: 1 });

    await pool.start();

    await expect(pool.acquire(50)).rejects.toMatchObject({ reason: "browser", retryable: true });
    expect(pool.stats()).toEqual({ available: 1, leased: 0, size: 1, waiting: 0 });

    finishLaunch(late);

    await vi.waitFor(() => expect(late.closed).toBe(true));
  });

  it("should give up a lazy launch when the caller cancels", async () => {

    const late = new FakeDriver();
    let finishLaunch = (_driver: FakeDriver): void => undefined;
    const launcher = vi.fn<() => Promise<FakeDriver>>().mockRejectedValueOnce(new Error("no chrome")).mockImplementation(async () => new Promise<FakeDriver>((resolve) => {

      finishLaunch = resolve;
    }));
    const pool = new BrowserSessionPool({ healthCheckTimeout: 100, launcher, size: 1 });
    const controller = new AbortController();

    await pool.start();

    const pending = pool.acquire(60000, controller.signal);

    await vi.waitFor(() => expect(launcher).toHaveBeenCalledTimes(2));

    controller.abort();

    await expect(pending).rejects.toThrow(ExtractionCancelledError);
    expect(pool.stats()).toEqual({ available: 1, leased: 0, size: 1, waiting: 0 });

    finishLaunch(late);

    await vi.waitFor(() => expect(late.closed).toBe(true));
  });

  it("should reject waiters and close idle browsers on stop", async () => {

    const { drivers, pool } = createPool(2);

    await pool.start();

    const held = await pool.acquire(100);

    await pool.acquire(100);

    const waiting = expect(pool.acquire(60000)).rejects.toThrow("The browser pool is shutting down.");

    await pool.stop();
    await waiting;
    await expect(pool.acquire(100)).rejects.toThrow(ExtractionCancelledError);

    await pool.release(held);

    expect(drivers[held.slot].closed).toBe(true);
  });
});
