export type { EmbeddingEncoder, ClipHttpEncoderConfig } from "./types.js";
export { DEFAULT_CLIP_ENCODER_CONFIG, DIMENSION_PROBE } from "./types.js";
export { ClipHttpEncoder, imageToDataUri } from "./clipClient.js";
