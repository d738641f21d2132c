import { describe, expect, it } from "vitest";

import { hashWebsharePassword, md5crypt } from "../src/domain/providers/md5crypt.js";

describe("md5crypt", () => {
  it("produces the $1$salt$hash layout", () => {
    const digest = md5crypt("test-secret", "abcdefgh");

    expect(digest).toMatch(/^\$1\$abcdefgh\$[./0-9A-Za-z]{22}$/u);
  });

  it("is deterministic for the same password and salt", () => {
    expect(md5crypt("test-secret", "abcdefgh")).toBe(md5crypt("test-secret", "abcdefgh"));
    expect(md5crypt("test-secret", "abcdefgh")).not.toBe(md5crypt("other-secret", "abcdefgh"));
    expect(md5crypt("test-secret", "abcdefgh")).not.toBe(md5crypt("test-secret", "hgfedcba"));
  });

  it("uses only the first eight salt characters and ignores the magic prefix", () => {
    const reference = md5crypt("test-secret", "abcdefgh");

    expect(md5crypt("test-secret", "abcdefghijkl")).toBe(reference);
    expect(md5crypt("test-secret", "$1$abcdefgh$ignored")).toBe(reference);
  });

  it("hashes the login password as sha1 hex of the crypt string", () => {
    const hashed = hashWebsharePassword("test-secret", "abcdefgh");

    expect(hashed).toMatch(/^[0-9a-f]{40}$/u);
    expect(hashWebsharePassword("test-secret", "abcdefgh")).toBe(hashed);
  });
});
