export type { Codec, Encoding } from "./codec";
export { Utf8Codec, utf8Codec, lossyUtf8Codec, codecFor } from "./utf8";
