export type { Decoder, Encoder } from "./codec";
