import { gunzip, gzip } from "zlib";
import { promisify } from "util";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

/**
 * Reversible byte transform applied to plaintext before encryption.
 */
export interface PayloadTransform {
  readonly name: string;
  encode(data: Buffer): Promise<Buffer>;
  decode(data: Buffer): Promise<Buffer>;
}

export const identityTransform: PayloadTransform = {
  name: "none",
  encode: async (data) => data,
  decode: async (data) => data,
};

export const gzipTransform: PayloadTransform = {
  name: "gzip",
  encode: (data) => gzipAsync(data),
  decode: (data) => gunzipAsync(data),
};

export const defaultTransforms: readonly PayloadTransform[] = [
  identityTransform,
  gzipTransform,
];
