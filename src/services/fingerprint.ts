// src/services/fingerprint.ts
import crypto from "crypto";

// Cache keys. The kind prefix keeps image and text keys in separate namespaces.

export function imageFingerprint(bytes: Buffer): string {
  return "image:" + crypto.createHash("md5").update(bytes).digest("hex");
}

export function textFingerprint(text: string): string {
  return "text:" + crypto.createHash("md5").update(text.toLowerCase(), "utf8").digest("hex");
}
