import { describe, test, expect, vi } from "vitest";
import { OpenAI } from "openai";
import type { ResponseOutputItem } from "openai/resources/responses/responses";
import {
  OpenAiProvider,
  createOpenAiClient,
  toAiResponse,
} from "../../src/services/ai/openai";
import { TranslationClient, extractText } from "../../src/services/ai";
import { ServiceError, TransportError } from "../../src/errors";
import { Logger } from "../../src/utils/logger";

const request = {
  model: "gpt-4o-mini",
  instructions: "Translate to German.",
  input: 'Text to translate:\n"Hello"',
};

const answer: ResponseOutputItem[] = [
  {
    id: "msg_1",
    type: "message",
    role: "assistant",
    status: "completed",
    content: [{ type: "output_text", text: "Hallo", annotations: [] }],
  },
];

const refusal: ResponseOutputItem[] = [
  {
    id: "msg_2",
    type: "message",
    role: "assistant",
    status: "completed",
    content: [{ type: "refusal", refusal: "I can't help with that." }],
  },
];

function setup() {
  const client = createOpenAiClient("test-key");
  const create = vi.spyOn(client.responses, "create");
  return { provider: new OpenAiProvider("test-key", client), create };
}

describe("createOpenAiClient", () => {
  test("should leave retries to the translation client", () => {
    const client = createOpenAiClient("test-key");

    expect(client.maxRetries).toBe(0);
    expect(client.baseURL).toBe("https://api.openai.com/v1");
  });
});

describe("OpenAiProvider", () => {
  test("should report its name", () => {
    expect(setup().provider.getProviderName()).toBe("OpenAI");
  });

  test("should send model, instructions and input", async () => {
    const { provider, create } = setup();
    create.mockRejectedValue(new Error("stop"));

    await expect(provider.createResponse(request)).rejects.toThrow("stop");
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      model: "gpt-4o-mini",
      instructions: "Translate to German.",
      input: 'Text to translate:\n"Hello"',
    });
  });

  test("should map connection failures to TransportError", async () => {
    const { provider, create } = setup();
    create.mockRejectedValue(
      new OpenAI.APIConnectionError({ message: "socket hang up" })
    );

    const error = await provider.createResponse(request).catch((e) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe("socket hang up");
    expect(error.retryable).toBe(true);
  });

  test("should map error statuses to ServiceError with the status", async () => {
    const { provider, create } = setup();
    create.mockRejectedValue(
      new OpenAI.APIError(503, { message: "overloaded" }, undefined, undefined)
    );

    const error = await provider.createResponse(request).catch((e) => e);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error.message).toBe("503 overloaded");
    expect(error.status).toBe(503);
    expect(error.retryable).toBe(true);
  });

  test("should pass other errors through unchanged", async () => {
    const { provider, create } = setup();
    const failure = new TypeError("bad argument");
    create.mockRejectedValue(failure);

    await expect(provider.createResponse(request)).rejects.toBe(failure);
  });
});

describe("toAiResponse", () => {
  test("should keep the text of output_text parts", () => {
    expect(toAiResponse(answer)).toEqual({
      output: [{ content: [{ text: "Hallo" }] }],
    });
    expect(extractText(toAiResponse(answer))).toBe("Hallo");
  });

  test("should never turn a refusal into text", () => {
    expect(toAiResponse(refusal)).toEqual({
      output: [{ content: [{ refusal: "I can't help with that." }] }],
    });
    expect(() => extractText(toAiResponse(refusal))).toThrow(
      "Model refused to translate: I can't help with that."
    );
  });

  test("should make the client fail on a refusal", async () => {
    const { provider } = setup();
    vi.spyOn(provider, "createResponse").mockResolvedValue(
      toAiResponse(refusal)
    );
    const client = new TranslationClient(provider, {
      maxRetries: 1,
      logger: new Logger(false),
      sleep: async () => {},
    });

    await expect(client.send("instructions", "Hello")).rejects.toThrow(
      "Failed after 1 retries"
    );
  });
});
