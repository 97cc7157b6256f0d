/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * store.test.ts: Tests for the persisted cookie store.
 */
import { CookieStore, normalizeDomain } from "../../src/cookies/store.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SessionCookie } from "../../src/types/index.js";
import { StoreUnavailableError } from "../../src/extraction/errors.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

// 2033-05-18, in milliseconds.
const NOW = 2000000000000;

function cookie(overrides: Partial<SessionCookie>): SessionCookie {

  return { domain: ".example.com", expires: 0, httpOnly: false, name: "SID", path: "/", secure: false, value: "test-secret", ...overrides };
}

describe("CookieStore", () => {

  let dir: string;
  let filePath: string;

  beforeEach(async () => {

    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "streamfetch-cookies-"));
    filePath = path.join(dir, "cookies.txt");
  });

  afterEach(async () => {

    await fsPromises.rm(dir, { force: true, recursive: true });
  });

  it("should report a missing file as StoreUnavailable", async () => {

    const store = new CookieStore(filePath, { now: () => NOW });

    await expect(store.load()).rejects.toThrow(StoreUnavailableError);
    await expect(store.load()).rejects.toThrow("Cookie store unavailable: the cookie file does not exist.");
  });

  it("should report an empty file as StoreUnavailable", async () => {

    await fsPromises.writeFile(filePath, "\n");

    await expect(new CookieStore(filePath).load()).rejects.toThrow("Cookie store unavailable: the cookie file is empty.");
  });

  it("should report a file with only expired cookies as StoreUnavailable", async () => {

    const store = new CookieStore(filePath, { now: () => NOW });

    await store.save([cookie({ expires: 1 })]);

    await expect(store.load()).rejects.toThrow("Cookie store unavailable: the cookie file contains no usable cookies.");
  });

  it("should persist cookies and load them back", async () => {

    const saved = [ cookie({}), cookie({ domain: "other.org", name: "pref", value: "dark" }) ];

    await new CookieStore(filePath, { now: () => NOW }).save(saved);

    expect(await new CookieStore(filePath, { now: () => NOW }).load()).toEqual(saved);
  });

  it("should drop expired cookies on load", async () => {

    const store = new CookieStore(filePath, { now: () => NOW });
    const live = cookie({ expires: 2000000100 });

    await store.save([ cookie({ expires: 1999999999, name: "old" }), live ]);

    expect(await store.load()).toEqual([live]);
  });

  it("should select cookies by host, path, and scheme", async () => {

    const store = new CookieStore(filePath, { now: () => NOW });
    const secure = cookie({ name: "secure", secure: true });
    const scoped = cookie({ name: "scoped", path: "/account" });

    await store.save([ secure, scoped ]);

    expect(store.forUrl("https://www.example.com/watch")).toEqual([secure]);
    expect(store.forUrl("http://example.com/account/settings")).toEqual([scoped]);
    expect(store.forUrl("https://example.org/")).toEqual([]);
    expect(store.forUrl("not a url")).toEqual([]);
  });

  it("should invalidate a domain and its parents without touching other sites", async () => {

    const store = new CookieStore(filePath, { now: () => NOW });
    const other = cookie({ domain: ".other.org" });

    await store.save([ cookie({}), cookie({ domain: "www.example.com", name: "host" }), other ]);

    expect(await store.invalidate("www.example.com")).toBe(2);
    expect(store.forUrl("https://www.example.com/")).toEqual([]);
    expect(await new CookieStore(filePath, { now: () => NOW }).load()).toEqual([other]);
  });

  it("should return zero when invalidating without a cookie file", async () => {

    expect(await new CookieStore(filePath).invalidate("example.com")).toBe(0);
  });

  it("should apply concurrent saves in order and leave no temporary files", async () => {

    const store = new CookieStore(filePath, { now: () => NOW });
    const last = [cookie({ value: "test-secret-2" })];

    await Promise.all([ store.save([cookie({ value: "test-secret-1" })]), store.save(last) ]);

    expect(await store.load()).toEqual(last);
    expect(await fsPromises.readdir(dir)).toEqual(["cookies.txt"]);
  });
});

describe("normalizeDomain", () => {

  it("should lowercase and strip leading dots", () => {

    expect(normalizeDomain("  ..Example.COM ")).toBe("example.com");
  });
});
