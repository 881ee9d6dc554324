import { TRANSPORT_ERROR_CODES, UploadErrorPayload } from "../../engine/uploads/errors";
import { isRecord } from "../../engine/guards";
import { UploadFile, UploadResponse } from "./uploadTypes";

/**
 * Per-upload-type hook around the transport.
 */
export interface UploadTransform {
  /** Runs before transmission */
  prepare(file: UploadFile): UploadFile | Promise<UploadFile>;
  /** Runs on a 2xx response; returns an error to reject it */
  verify(response: UploadResponse): UploadErrorPayload | null;
}

export const identityTransform: UploadTransform = {
  prepare: (file) => file,
  verify: () => null,
};

/**
 * EPP uploads travel base64-encoded and must be confirmed by the server
 * with `{ verificationToken: "VALID" }`.
 */
export class Base64VerifiedTransform implements UploadTransform {
  prepare(file: UploadFile): UploadFile {
    const encoded = Buffer.from(file.bytes).toString("base64");
    const bytes = new TextEncoder().encode(encoded);
    return { ...file, bytes, size: bytes.length };
  }

  /**
   * Inverse of `prepare`.
   */
  decode(file: UploadFile): UploadFile {
    const text = new TextDecoder().decode(file.bytes);
    const bytes = new Uint8Array(Buffer.from(text, "base64"));
    return { ...file, bytes, size: bytes.length };
  }

  verify(response: UploadResponse): UploadErrorPayload | null {
    if (isRecord(response.body) && response.body.verificationToken === "VALID") {
      return null;
    }
    return {
      message: "Invalid verification token",
      errorCode: TRANSPORT_ERROR_CODES.invalidToken,
      state: "verification",
    };
  }
}

export function defaultTransforms(): Partial<Record<"epp", UploadTransform>> {
  return { epp: new Base64VerifiedTransform() };
}
