import { createHash, generateKeyPairSync, randomBytes } from "node:crypto";

export const INDEPENDENT_GENERATOR_TYPES = ["password", "token", "fernet-key", "rsa-private-key"] as const;
export type IndependentGeneratorType = (typeof INDEPENDENT_GENERATOR_TYPES)[number];

export const DERIVED_GENERATOR_TYPES = ["sha256-hex", "mtime"] as const;
export type DerivedGeneratorType = (typeof DERIVED_GENERATOR_TYPES)[number];

export type IndependentGenerator = () => string;
export type DerivedGenerator = (source: string) => string;

export type SecretGenerators = {
  independent: Readonly<Record<string, IndependentGenerator>>;
  derived: Readonly<Record<string, DerivedGenerator>>;
};

function base64Url(bytes: Buffer): string {
  return bytes.toString("base64").replace(/\+/g, "-").replace(/\//g, "_").replace(/=+$/, "");
}

export function generatePassword(): string {
  return randomBytes(32).toString("hex");
}

export function generateToken(): string {
  return `gt-${base64Url(randomBytes(16))}.${base64Url(randomBytes(16))}`;
}

// Fernet keys keep their base64 padding.
export function generateFernetKey(): string {
  return randomBytes(32).toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
}

export function generateRsaPrivateKey(): string {
  const { privateKey } = generateKeyPairSync("rsa", {
    modulusLength: 2048,
    publicExponent: 0x10001,
    privateKeyEncoding: { type: "pkcs8", format: "pem" },
    publicKeyEncoding: { type: "spki", format: "pem" },
  });
  return privateKey;
}

export function sha256Hex(source: string): string {
  return createHash("sha256").update(source, "utf8").digest("hex");
}

export function utcTimestamp(now: Date = new Date()): string {
  return `${now.toISOString().slice(0, 19)}Z`;
}

export const DEFAULT_SECRET_GENERATORS: SecretGenerators = {
  independent: {
    password: generatePassword,
    token: generateToken,
    "fernet-key": generateFernetKey,
    "rsa-private-key": generateRsaPrivateKey,
  } satisfies Record<IndependentGeneratorType, IndependentGenerator>,
  derived: {
    "sha256-hex": sha256Hex,
    // The source only gates generation; the value is the time it was first produced.
    mtime: () => utcTimestamp(),
  } satisfies Record<DerivedGeneratorType, DerivedGenerator>,
};
