import { describe, it, expect } from "vitest";
import { ConversionDispatcher } from "./dispatcher";
import type {
  ConvertOptions,
  Converter,
  ConverterResult,
  SourceItem,
} from "../types";

const encoder = new TextEncoder();

function item(name: string, overrides: Partial<SourceItem> = {}): SourceItem {
  const dot = name.lastIndexOf(".");
  return {
    name,
    sourceFormat: dot > 0 ? name.slice(dot + 1).toLowerCase() : "",
    origin: "direct-upload",
    payload: encoder.encode(`content of ${name}`),
    ...overrides,
  };
}

function converter(
  handle: (input: Uint8Array, options: ConvertOptions) => Promise<ConverterResult>,
): Converter {
  return {
    convert: (input, _source, _target, options) => handle(input, options),
  };
}

const upper = converter(async (input) => ({
  status: "OK",
  data: encoder.encode(new TextDecoder().decode(input).toUpperCase()),
}));

const hang = converter(
  (_input, options) =>
    new Promise<ConverterResult>((_resolve, reject) => {
      options.signal?.addEventListener("abort", () => reject(new Error("stopped")));
    }),
);

describe("ConversionDispatcher", () => {
  it("returns success with the converted bytes", async () => {
    const outcome = await new ConversionDispatcher(upper).dispatch(item("a.txt"), "md");

    expect(outcome).toEqual({
      name: "a.txt",
      origin: "direct-upload",
      outputName: "a.md",
      status: "success",
      outputBytes: encoder.encode("CONTENT OF A.TXT"),
    });
  });

  it("reports item defects without calling the converter", async () => {
    let calls = 0;
    const counting = converter(async () => {
      calls++;
      return { status: "OK", data: new Uint8Array() };
    });
    const defect = { kind: "CorruptArchiveEntry" as const, message: "CRC mismatch" };

    const outcome = await new ConversionDispatcher(counting).dispatch(
      item("b.txt", { payload: null, defect }),
      "md",
    );

    expect(outcome).toMatchObject({ status: "failed", error: defect });
    expect(calls).toBe(0);
  });

  it("skips formats outside the allow-list", async () => {
    const outcome = await new ConversionDispatcher(upper).dispatch(
      item("c.docx"),
      "pdf",
      ["TXT", " .html"],
    );

    expect(outcome).toEqual({
      name: "c.docx",
      origin: "direct-upload",
      outputName: "c.pdf",
      status: "skipped",
      error: {
        kind: "UnsupportedSource",
        message: 'Source format "docx" is not in the allowed list (txt, html)',
      },
    });
  });

  it("treats an empty allow-list as allowing everything", async () => {
    const outcome = await new ConversionDispatcher(upper).dispatch(item("d.xyz"), "md", []);
    expect(outcome.status).toBe("success");
  });

  it("passes converter statuses through verbatim", async () => {
    const malformed = converter(async () => ({
      status: "MalformedSource",
      message: "not a real docx",
    }));

    const outcome = await new ConversionDispatcher(malformed).dispatch(item("e.docx"), "pdf");

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "MalformedSource", message: "not a real docx" },
    });
  });

  it("turns converter exceptions into InternalError", async () => {
    const throwing = converter(async () => {
      throw new Error("segfault in renderer");
    });

    const outcome = await new ConversionDispatcher(throwing).dispatch(item("f.txt"), "md");

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "InternalError", message: "segfault in renderer" },
    });
  });

  it("times out a slow conversion and signals the converter", async () => {
    let aborted = false;
    const observed = converter(
      (_input, options) =>
        new Promise<ConverterResult>((_resolve, reject) => {
          options.signal?.addEventListener("abort", () => {
            aborted = true;
            reject(new Error("stopped"));
          });
        }),
    );

    const outcome = await new ConversionDispatcher(observed).dispatch(item("g.txt"), "md", [], {
      timeout: 20,
    });

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "Timeout", message: "Conversion timed out after 20ms" },
    });
    expect(aborted).toBe(true);
  });

  it("waits for a converter that ignores the deadline before returning", async () => {
    let settled = false;
    const stubborn = converter(async (input) => {
      await new Promise((resolve) => setTimeout(resolve, 60));
      settled = true;
      return { status: "OK", data: input };
    });

    const outcome = await new ConversionDispatcher(stubborn).dispatch(item("g.txt"), "md", [], {
      timeout: 10,
    });

    expect(settled).toBe(true);
    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "Timeout", message: "Conversion timed out after 10ms" },
    });
  });

  it("reports cancellation before the conversion starts", async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await new ConversionDispatcher(upper).dispatch(item("h.txt"), "md", [], {
      signal: controller.signal,
    });

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "Cancelled", message: "Batch cancelled before conversion started" },
    });
  });

  it("reports cancellation during the conversion", async () => {
    const controller = new AbortController();
    const pending = new ConversionDispatcher(hang).dispatch(item("i.txt"), "md", [], {
      signal: controller.signal,
      timeout: 10_000,
    });
    controller.abort();

    expect(await pending).toMatchObject({
      status: "failed",
      error: { kind: "Cancelled", message: "Batch cancelled before conversion finished" },
    });
  });

  it("refuses an item whose payload was released", async () => {
    const outcome = await new ConversionDispatcher(upper).dispatch(
      item("j.txt", { payload: null }),
      "md",
    );

    expect(outcome).toMatchObject({
      status: "failed",
      error: { kind: "InternalError", message: "Item payload was already released" },
    });
  });

  it("forwards converter options", async () => {
    let seen: ConvertOptions | undefined;
    const recording = converter(async (_input, options) => {
      seen = options;
      return { status: "OK", data: new Uint8Array() };
    });

    await new ConversionDispatcher(recording).dispatch(item("k.txt"), "md", [], {
      converterOptions: { quality: "high" },
    });

    expect(seen?.quality).toBe("high");
    expect(seen?.signal).toBeInstanceOf(AbortSignal);
  });
});
