import { describe, it, expect, vi } from "vitest";
import type { OcrConfig } from "../config.js";
import { ConfigurationError, OcrError } from "../errors.js";
import { OcrClient, createOcrProvider } from "./index.js";
import type { OcrOperation, OcrProvider, OcrResult } from "./types.js";

const config: OcrConfig = {
  endpoint: "https://ocr.test",
  apiKey: "test-secret",
  apiVersion: "2024-11-30",
  layoutPages: "1-2",
  submitTimeoutMs: 20,
  resultTimeoutMs: 40,
  imageResultTimeoutMs: 50,
  secondaryResultTimeoutMs: 60,
  pollIntervalMs: 0,
};

const document = new Uint8Array([1, 2, 3]);

function result(text: string, modelId = "prebuilt-read"): OcrResult {
  return { text, layout: null, modelId, pageCount: 1 };
}

function operationOf(value: OcrResult) {
  const waitForResult = vi.fn<OcrOperation["waitForResult"]>().mockResolvedValue(value);
  return { waitForResult };
}

/** Never settles on its own; rejects once the caller aborts */
function stalled<T>(signal: AbortSignal | undefined): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });
}

function createProvider(submit: OcrProvider["submit"]) {
  const provider = { name: "fake", submit: vi.fn(submit) };
  return { provider, client: new OcrClient(provider, config) };
}

describe("createOcrProvider", () => {
  it("requires an endpoint and key", () => {
    expect(() => createOcrProvider({ ...config, apiKey: "" })).toThrow(
      ConfigurationError,
    );
  });
});

describe("OcrClient.recognize", () => {
  it("reads images in read mode with the image deadline", async () => {
    const operation = operationOf(result("image text"));
    const { provider, client } = createProvider(async () => operation);

    const outcome = await client.recognize(document, "jpg");

    expect(outcome).toEqual({
      result: result("image text"),
      mode: "read",
      downgraded: false,
    });
    expect(provider.submit).toHaveBeenCalledTimes(1);
    expect(provider.submit.mock.calls[0][1]).toEqual({ mode: "read" });
    expect(operation.waitForResult.mock.calls[0][0].timeoutMs).toBe(50);
  });

  it("analyzes the first pages of a PDF in layout mode", async () => {
    const operation = operationOf(result("layout text", "prebuilt-layout"));
    const { provider, client } = createProvider(async () => operation);

    const outcome = await client.recognize(document, "pdf");

    expect(outcome.mode).toBe("layout");
    expect(outcome.downgraded).toBe(false);
    expect(provider.submit.mock.calls[0][1]).toEqual({
      mode: "layout",
      pages: "1-2",
      contentFormat: "markdown",
    });
    expect(operation.waitForResult.mock.calls[0][0].timeoutMs).toBe(40);
  });

  it("falls back to read mode when the layout submission stalls", async () => {
    const readOperation = operationOf(result("read text"));
    const { provider, client } = createProvider(async (_doc, request, signal) =>
      request.mode === "layout" ? stalled<OcrOperation>(signal) : readOperation,
    );

    const outcome = await client.recognize(document, "pdf");

    expect(outcome).toEqual({
      result: result("read text"),
      mode: "read",
      downgraded: true,
    });
    expect(provider.submit).toHaveBeenCalledTimes(2);
    expect(provider.submit.mock.calls[1][1]).toEqual({ mode: "read" });
    expect(provider.submit.mock.calls[0][2].aborted).toBe(true);
  });

  it("does not downgrade on provider errors", async () => {
    const { provider, client } = createProvider(async () => {
      throw new Error("connection reset");
    });

    let caught: unknown;
    try {
      await client.recognize(document, "pdf");
    } catch (err) {
      caught = err;
    }

    expect(provider.submit).toHaveBeenCalledTimes(1);
    expect(caught).toBeInstanceOf(OcrError);
    if (caught instanceof OcrError) {
      expect(caught.kind).toBe("provider");
      expect(caught.message).toBe("fake layout submission failed: connection reset");
    }
  });

  it("fails with a result timeout when the analysis never completes", async () => {
    const { provider, client } = createProvider(async () => ({
      waitForResult: ({ signal }) => stalled<OcrResult>(signal),
    }));

    let caught: unknown;
    try {
      await client.recognize(document, "pdf");
    } catch (err) {
      caught = err;
    }

    expect(provider.submit).toHaveBeenCalledTimes(1);
    expect(caught).toBeInstanceOf(OcrError);
    if (caught instanceof OcrError) {
      expect(caught.kind).toBe("result-timeout");
      expect(caught.message).toBe("fake layout result not ready after 40ms");
    }
  });
});

describe("OcrClient.readPlain", () => {
  it("runs a read pass with the secondary deadline", async () => {
    const operation = operationOf(result("plain"));
    const { provider, client } = createProvider(async () => operation);

    await expect(client.readPlain(document)).resolves.toEqual(result("plain"));
    expect(provider.submit.mock.calls[0][1]).toEqual({ mode: "read" });
    expect(operation.waitForResult.mock.calls[0][0].timeoutMs).toBe(60);
  });
});
