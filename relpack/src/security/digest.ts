import crypto, { type KeyObject } from "node:crypto";
import fs from "node:fs";
import { KeyError } from "../errors.js";

export const DIGEST_FILE = "digest.bin";
export const DIGEST_LENGTH = 32;

const RSA_KEY_BITS = 3072;
const RSA_KEY_BYTES = RSA_KEY_BITS / 8;
const ECDSA_POINT_BYTES = 64;

/** Curve ids understood by the ROM's Secure Boot V2 ECDSA verifier. */
const CURVE_IDS: Record<string, { id: number; bytes: number }> = {
  prime192v1: { id: 1, bytes: 24 },
  prime256v1: { id: 2, bytes: 32 },
};

function errorCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

function bigIntFromBase64Url(value: string): bigint {
  const hex = Buffer.from(value, "base64url").toString("hex");
  return hex.length === 0 ? 0n : BigInt(`0x${hex}`);
}

function toLittleEndian(value: bigint, size: number): Buffer {
  const out = Buffer.alloc(size);
  let rest = value;
  for (let i = 0; i < size; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

function modInverse(a: bigint, m: bigint): bigint {
  let [oldR, r] = [a % m, m];
  let [oldS, s] = [1n, 0n];
  while (r !== 0n) {
    const q = oldR / r;
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
  }
  return ((oldS % m) + m) % m;
}

function loadPrivateKey(material: Buffer, keyPath: string): KeyObject {
  const isPem = material.includes("-----BEGIN");
  try {
    return isPem
      ? crypto.createPrivateKey({ key: material, format: "pem" })
      : crypto.createPrivateKey({ key: material, format: "der", type: "pkcs8" });
  } catch (e: unknown) {
    if (errorCode(e) === "ERR_MISSING_PASSPHRASE") {
      throw new KeyError(keyPath, "unsupported", `Signing key ${keyPath} is passphrase-protected; supply an unencrypted key`);
    }
    throw new KeyError(keyPath, "malformed", `Signing key ${keyPath} is not a PEM or DER private key`);
  }
}

function rsaBlock(publicKey: KeyObject, keyPath: string): Buffer {
  const bits = publicKey.asymmetricKeyDetails?.modulusLength;
  if (bits !== RSA_KEY_BITS) {
    throw new KeyError(
      keyPath,
      "unsupported",
      `Signing key ${keyPath} is RSA-${bits ?? "?"}; Secure Boot V2 requires RSA-${RSA_KEY_BITS}`,
    );
  }
  const jwk = publicKey.export({ format: "jwk" });
  if (jwk.n === undefined || jwk.e === undefined) {
    throw new KeyError(keyPath, "malformed", `Signing key ${keyPath} has no RSA public components`);
  }

  const n = bigIntFromBase64Url(jwk.n);
  const e = bigIntFromBase64Url(jwk.e);
  const word = 1n << 32n;
  const rinv = (1n << BigInt(RSA_KEY_BITS * 2)) % n;
  const m = (word - modInverse(n, word)) % word;

  const eBuf = Buffer.alloc(4);
  eBuf.writeUInt32LE(Number(e));
  const mBuf = Buffer.alloc(4);
  mBuf.writeUInt32LE(Number(m));

  return Buffer.concat([toLittleEndian(n, RSA_KEY_BYTES), eBuf, toLittleEndian(rinv, RSA_KEY_BYTES), mBuf]);
}

function ecdsaBlock(publicKey: KeyObject, keyPath: string): Buffer {
  const curveName = publicKey.asymmetricKeyDetails?.namedCurve ?? "unknown";
  const curve = CURVE_IDS[curveName];
  if (!curve) {
    throw new KeyError(keyPath, "unsupported", `Signing key ${keyPath} uses curve ${curveName}; expected P-192 or P-256`);
  }
  // SPKI ends with the uncompressed point 04 || x || y, big-endian
  const spki = publicKey.export({ format: "der", type: "spki" });
  const raw = spki.subarray(spki.length - 2 * curve.bytes);
  if (spki[spki.length - 2 * curve.bytes - 1] !== 0x04) {
    throw new KeyError(keyPath, "malformed", `Signing key ${keyPath} has no uncompressed EC public point`);
  }

  const point = Buffer.alloc(ECDSA_POINT_BYTES);
  Buffer.from(raw.subarray(0, curve.bytes)).reverse().copy(point, 0);
  Buffer.from(raw.subarray(curve.bytes)).reverse().copy(point, curve.bytes);

  return Buffer.concat([Buffer.from([curve.id]), point]);
}

/**
 * Secure Boot V2 public-key digest of a private key held in memory. The key
 * block is laid out the way it appears in a signature block (little-endian
 * bignums) and hashed with SHA-256.
 */
export function digestFromKeyMaterial(material: Buffer, keyPath = "<memory>"): Buffer {
  const privateKey = loadPrivateKey(material, keyPath);
  const publicKey = crypto.createPublicKey(privateKey);

  let block: Buffer;
  switch (publicKey.asymmetricKeyType) {
    case "rsa":
      block = rsaBlock(publicKey, keyPath);
      break;
    case "ec":
      block = ecdsaBlock(publicKey, keyPath);
      break;
    default:
      throw new KeyError(
        keyPath,
        "unsupported",
        `Signing key ${keyPath} is ${publicKey.asymmetricKeyType ?? "an unknown type"}; expected RSA-3072 or ECDSA`,
      );
  }
  return crypto.createHash("sha256").update(block).digest();
}

/**
 * Read the signing key, derive its digest, and zero the key bytes before
 * returning or throwing.
 */
export function deriveDigest(keyPath: string): Buffer {
  if (!fs.existsSync(keyPath)) {
    throw new KeyError(keyPath, "missing", `Signing key not found: ${keyPath}`);
  }

  let material: Buffer;
  try {
    material = fs.readFileSync(keyPath);
  } catch (e: unknown) {
    throw new KeyError(keyPath, "unreadable", `Signing key ${keyPath} could not be read (${errorCode(e) ?? "I/O error"})`);
  }

  try {
    return digestFromKeyMaterial(material, keyPath);
  } finally {
    material.fill(0);
  }
}
