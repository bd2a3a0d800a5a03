import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
export const MIN_TEXT_ENCRYPTION_KEY_LENGTH = 16;

/** Output format: `base64(iv).base64(tag).base64(ciphertext)`. */
export class TextEncryptor {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (secret.length < MIN_TEXT_ENCRYPTION_KEY_LENGTH) {
      throw new Error(`Text encryption key must have at least ${MIN_TEXT_ENCRYPTION_KEY_LENGTH} characters`);
    }
    this.key = createHash("sha256").update(secret, "utf-8").digest();
  }

  encrypt(plainText: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const encrypted = Buffer.concat([cipher.update(plainText, "utf-8"), cipher.final()]);
    return [iv, cipher.getAuthTag(), encrypted].map((part) => part.toString("base64")).join(".");
  }

  decrypt(payload: string): string {
    const [iv, tag, encrypted] = payload.split(".").map((part) => Buffer.from(part, "base64"));
    if (!iv || !tag || !encrypted) {
      throw new Error("Encrypted payload is malformed");
    }
    const decipher = createDecipheriv(ALGORITHM, this.key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString("utf-8");
  }
}
