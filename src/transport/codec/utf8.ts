import { TextDecoder, TextEncoder } from "util";
import type { Codec, Encoding } from "./codec";

/**
 * UTF-8 codec.
 * The strict variant rejects malformed input; the lossy variant substitutes U+FFFD.
 */
export class Utf8Codec implements Codec {
  private readonly encoder = new TextEncoder();
  private readonly decoder: TextDecoder;
  private readonly lossy: boolean;

  constructor(options: { lossy?: boolean } = {}) {
    this.lossy = options.lossy ?? false;
    this.decoder = new TextDecoder("utf-8", { fatal: !this.lossy });
  }

  name(): Encoding {
    return this.lossy ? "utf-8-lossy" : "utf-8";
  }

  encode(text: string): Uint8Array {
    return this.encoder.encode(text);
  }

  decode(data: Uint8Array): string {
    return this.decoder.decode(data);
  }
}

/**
 * Singleton strict UTF-8 codec.
 */
export const utf8Codec = new Utf8Codec();

/**
 * Singleton lossy UTF-8 codec.
 */
export const lossyUtf8Codec = new Utf8Codec({ lossy: true });

/**
 * Look up the codec for an encoding name.
 */
export function codecFor(encoding: Encoding): Codec {
  return encoding === "utf-8-lossy" ? lossyUtf8Codec : utf8Codec;
}
