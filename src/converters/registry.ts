/**
 * Converter Registry
 * Table of (source, target) handlers behind the Converter interface
 */

import type {
  Converter,
  ConverterResult,
  ConvertOptions,
  SupportedConversions,
} from "../types";

export type ConversionHandler = (
  input: Uint8Array,
  options: ConvertOptions,
) => ConverterResult | Promise<ConverterResult>;

function pairKey(source: string, target: string): string {
  return `${source}->${target}`;
}

export class ConverterRegistry implements Converter {
  private handlers = new Map<string, ConversionHandler>();
  private pairs: SupportedConversions = {};

  register(source: string, target: string, handler: ConversionHandler): this {
    this.handlers.set(pairKey(source, target), handler);
    const targets = (this.pairs[source] ??= []);
    if (!targets.includes(target)) targets.push(target);
    return this;
  }

  supports(source: string, target: string): boolean {
    return this.handlers.has(pairKey(source, target));
  }

  /**
   * Source format -> target formats, both sorted
   */
  supportedConversions(): SupportedConversions {
    const result: SupportedConversions = {};
    for (const source of Object.keys(this.pairs).sort()) {
      result[source] = [...(this.pairs[source] ?? [])].sort();
    }
    return result;
  }

  async convert(
    input: Uint8Array,
    sourceFormat: string,
    targetFormat: string,
    options: ConvertOptions,
  ): Promise<ConverterResult> {
    const handler = this.handlers.get(pairKey(sourceFormat, targetFormat));
    if (!handler) {
      return {
        status: "UnsupportedPair",
        message: `Conversion from ${sourceFormat || "(unknown)"} to ${targetFormat} is not supported`,
      };
    }
    return handler(input, options);
  }
}
