/**
 * Converter collaborator contract
 */

export type ConversionStatus =
  | "OK"
  | "UnsupportedPair"
  | "MalformedSource"
  | "InternalError";

export type ConverterResult =
  | { status: "OK"; data: Uint8Array }
  | {
      status: Exclude<ConversionStatus, "OK">;
      message: string;
    };

export interface ConvertOptions {
  signal?: AbortSignal;
  [key: string]: unknown;
}

export interface Converter {
  convert(
    input: Uint8Array,
    sourceFormat: string,
    targetFormat: string,
    options: ConvertOptions,
  ): Promise<ConverterResult>;
  supportedConversions?(): SupportedConversions;
}

// Maps source format to the target formats it can be converted into
export type SupportedConversions = Record<string, string[]>;
