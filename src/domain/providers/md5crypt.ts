import { createHash } from "node:crypto";

const MAGIC = "$1$";
const ITOA64 = "./0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const ROUNDS = 1000;

/**
 * FreeBSD-style MD5-crypt (`$1$salt$hash`). The salt may carry the `$1$`
 * prefix and a trailing `$...` part; only its first 8 characters are used.
 */
export function md5crypt(password: string, salt: string): string {
  const pw = Buffer.from(password, "utf8");
  const saltBytes = Buffer.from(normalizeSalt(salt), "utf8");

  const ctx = createHash("md5").update(pw).update(MAGIC).update(saltBytes);
  const alternate = createHash("md5").update(pw).update(saltBytes).update(pw).digest();

  for (let remaining = pw.length; remaining > 0; remaining -= 16) {
    ctx.update(alternate.subarray(0, Math.min(16, remaining)));
  }

  for (let bits = pw.length; bits > 0; bits >>= 1) {
    ctx.update(bits & 1 ? Buffer.from([0]) : pw.subarray(0, 1));
  }

  let final = ctx.digest();

  for (let round = 0; round < ROUNDS; round += 1) {
    const step = createHash("md5");
    step.update(round % 2 === 1 ? pw : final);
    if (round % 3 !== 0) {
      step.update(saltBytes);
    }
    if (round % 7 !== 0) {
      step.update(pw);
    }
    step.update(round % 2 === 1 ? final : pw);
    final = step.digest();
  }

  const byte = (index: number): number => final[index] ?? 0;
  const encoded =
    to64((byte(0) << 16) | (byte(6) << 8) | byte(12), 4) +
    to64((byte(1) << 16) | (byte(7) << 8) | byte(13), 4) +
    to64((byte(2) << 16) | (byte(8) << 8) | byte(14), 4) +
    to64((byte(3) << 16) | (byte(9) << 8) | byte(15), 4) +
    to64((byte(4) << 16) | (byte(10) << 8) | byte(5), 4) +
    to64(byte(11), 2);

  return `${MAGIC}${saltBytes.toString("utf8")}$${encoded}`;
}

/** Password form expected by the Webshare login endpoint. */
export function hashWebsharePassword(password: string, salt: string): string {
  return createHash("sha1").update(md5crypt(password, salt), "utf8").digest("hex");
}

function normalizeSalt(salt: string): string {
  const withoutMagic = salt.startsWith(MAGIC) ? salt.slice(MAGIC.length) : salt;
  return (withoutMagic.split("$", 1)[0] ?? "").slice(0, 8);
}

function to64(value: number, length: number): string {
  let out = "";
  let remaining = value;
  for (let index = 0; index < length; index += 1) {
    out += ITOA64.charAt(remaining & 0x3f);
    remaining >>= 6;
  }
  return out;
}
