import { describe, expect, test } from "vitest";
import { InternalError, KeyNotFoundError, ValueTooLargeError } from "../../src/errors.js";
import { DIGEST_LENGTH, KeyStore, digestOf } from "../../src/key_store.js";
import type { KeyStoreEvent } from "../../src/key_store.js";

describe("digestOf", () => {
  test("is unpadded base64url md5", () => {
    expect(digestOf("12345")).toBe("gnzLDuqKcGxMNKFokfhOew");
    expect(digestOf("")).toBe("1B2M2Y8AsgTpgAmY7PhCfg");
    expect(digestOf("héllo")).toBe("vlDoR4zyT_NZW8cwf7kbUA");
    expect(digestOf("héllo")).toHaveLength(DIGEST_LENGTH);
  });
});

describe("KeyStore.create", () => {
  test("takes the first six digest characters when free", () => {
    const store = new KeyStore();
    expect(store.create("12345")).toBe("gnzLDu");
    expect(store.lookup("gnzLDu")).toBe("12345");
  });

  test("re-creating a value returns its existing key", () => {
    const store = new KeyStore();
    const first = store.createEntry("hello");
    const second = store.createEntry("hello");

    expect(first).toEqual({ key: "XUFAKr", created: true, collisions: 0 });
    expect(second).toEqual({ key: "XUFAKr", created: false, collisions: 0 });
    expect(store.size).toBe(1);
  });

  test("accepts the empty string", () => {
    const store = new KeyStore();
    expect(store.create("")).toBe("1B2M2Y");
    expect(store.lookup("1B2M2Y")).toBe("");
  });

  test("slides the window right on collision", () => {
    // digests of "value-20" and "12345" both start with "g"
    const store = new KeyStore({ minKeySize: 1 });
    expect(store.create("value-20")).toBe("g");

    expect(store.createEntry("12345")).toEqual({ key: "n", created: true, collisions: 1 });
    expect(store.lookup("g")).toBe("value-20");
    expect(store.lookup("n")).toBe("12345");
  });

  test("re-create after a collision retraces the probe to the same key", () => {
    const store = new KeyStore({ minKeySize: 1 });
    store.create("value-20");
    store.create("12345");

    expect(store.createEntry("12345")).toEqual({ key: "n", created: false, collisions: 1 });
    expect(store.size).toBe(2);
  });

  test("grows the window once every offset at the current size is taken", () => {
    const store = new KeyStore({ minKeySize: 1 });
    for (let i = 0; i < 400; i++) store.create(`value-${i}`);

    // all 64 single-character keys are held by now
    expect(store.createEntry("12345")).toEqual({ key: "gn", created: true, collisions: 22 });
    expect(store.lookup("gn")).toBe("12345");
  });

  test("distinct values never share a key", () => {
    const store = new KeyStore({ minKeySize: 1 });
    const keys = new Map<string, string>();
    for (let i = 0; i < 300; i++) {
      const value = `value-${i}`;
      keys.set(store.create(value), value);
    }

    expect(keys.size).toBe(300);
    for (const [key, value] of keys) expect(store.lookup(key)).toBe(value);
  });

  test("same inserts in the same order rebuild the same keys", () => {
    const values = Array.from({ length: 200 }, (_, i) => `value-${i}`);
    const a = new KeyStore({ minKeySize: 2 });
    const b = new KeyStore({ minKeySize: 2 });

    expect(values.map((v) => a.create(v))).toEqual(values.map((v) => b.create(v)));
  });

  test("rejects values longer than maxLen without storing them", () => {
    const store = new KeyStore({ maxLen: 5 });
    expect(() => store.create("123456")).toThrow(ValueTooLargeError);
    expect(store.size).toBe(0);
  });

  test("measures length in utf-8 bytes", () => {
    const store = new KeyStore({ maxLen: 5 });
    expect(store.create("hello")).toBe("XUFAKr");
    // 5 characters, 6 bytes
    expect(() => store.create("héllo")).toThrow(ValueTooLargeError);
  });

  test("default maxLen is 2083", () => {
    const store = new KeyStore();
    expect(() => store.create("a".repeat(2083))).not.toThrow();
    expect(() => store.create("a".repeat(2084))).toThrow(ValueTooLargeError);
  });
});

describe("KeyStore.lookup", () => {
  test("fails with KeyNotFoundError for unknown keys", () => {
    const store = new KeyStore();
    store.create("12345");
    expect(() => store.lookup("gnzLD")).toThrow(KeyNotFoundError);
    expect(() => store.lookup("abcdef")).toThrow(KeyNotFoundError);
  });

  test("rejects keys longer than maxLen", () => {
    const store = new KeyStore({ maxLen: 5 });
    expect(() => store.lookup("abcdef")).toThrow(ValueTooLargeError);
  });
});

describe("KeyStore options", () => {
  test("rejects minKeySize outside the digest", () => {
    expect(() => new KeyStore({ minKeySize: 0 })).toThrow(RangeError);
    expect(() => new KeyStore({ minKeySize: 23 })).toThrow(RangeError);
    expect(() => new KeyStore({ minKeySize: 22 })).not.toThrow();
  });

  test("full-width keys are the whole digest", () => {
    const store = new KeyStore({ minKeySize: DIGEST_LENGTH });
    expect(store.create("12345")).toBe("gnzLDuqKcGxMNKFokfhOew");
  });
});

describe("KeyStore listener", () => {
  test("reports one event per call", () => {
    const events: KeyStoreEvent[] = [];
    const store = new KeyStore({ minKeySize: 1, maxLen: 10, listener: (e) => events.push(e) });

    store.create("value-20");
    store.create("12345");
    store.create("12345");
    store.lookup("n");
    expect(() => store.lookup("zz")).toThrow(KeyNotFoundError);
    expect(() => store.create("x".repeat(11))).toThrow(ValueTooLargeError);

    expect(events).toHaveLength(6);
    expect(events[0]).toEqual({ op: "create", ok: true, outcome: { key: "g", created: true, collisions: 0 } });
    expect(events[1]).toEqual({ op: "create", ok: true, outcome: { key: "n", created: true, collisions: 1 } });
    expect(events[2]).toEqual({ op: "create", ok: true, outcome: { key: "n", created: false, collisions: 1 } });
    expect(events[3]).toEqual({ op: "lookup", ok: true, key: "n" });
    expect(events[4]).toMatchObject({ op: "lookup", ok: false });
    expect(events[5]).toMatchObject({ op: "create", ok: false });
  });

  test("a throwing listener does not turn a stored create into a failure event", () => {
    const events: KeyStoreEvent[] = [];
    const boom = new InternalError("listener broke");
    const store = new KeyStore({
      listener: (e) => {
        events.push(e);
        if (events.length === 1) throw boom;
      }
    });

    expect(() => store.create("12345")).toThrow(boom);
    expect(events).toEqual([{ op: "create", ok: true, outcome: { key: "gnzLDu", created: true, collisions: 0 } }]);
    expect(store.lookup("gnzLDu")).toBe("12345");
  });
});

describe("window exhaustion", () => {
  test("fails with InternalError once the whole digest is taken", () => {
    const events: KeyStoreEvent[] = [];
    const store = new KeyStore({ minKeySize: 1, digest: () => "ab", listener: (e) => events.push(e) });

    expect(store.create("x")).toBe("a");
    expect(store.create("y")).toBe("b");
    expect(store.create("z")).toBe("ab");
    expect(() => store.create("w")).toThrow(InternalError);

    expect(store.size).toBe(3);
    expect(events[3]).toMatchObject({ op: "create", ok: false, error: { code: "internal_error" } });
  });
});

describe("InternalError", () => {
  test("is distinct from the domain errors", () => {
    const err = new InternalError("boom");
    expect(err.code).toBe("internal_error");
    expect(err).not.toBeInstanceOf(ValueTooLargeError);
    expect(err).not.toBeInstanceOf(KeyNotFoundError);
  });
});
