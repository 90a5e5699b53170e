/**
 * Codec interface for turning caller text into payload bytes and back.
 * Payloads stay opaque to the transport; only the client facade uses a codec.
 */
export interface Codec {
  /**
   * Get the codec name as accepted by `withEncoding`.
   */
  name(): Encoding;

  /**
   * Encode caller text to bytes.
   */
  encode(text: string): Uint8Array;

  /**
   * Decode received bytes to text. Throws if the bytes are not valid for
   * this encoding and the codec is strict.
   */
  decode(data: Uint8Array): string;
}

/**
 * Supported payload text encodings.
 */
export type Encoding = "utf-8" | "utf-8-lossy";
