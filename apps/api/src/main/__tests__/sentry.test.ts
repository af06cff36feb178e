import { describe, expect, it, vi } from "vitest";
import { captureException, scrubEvent } from "../sentry";

vi.mock("../../shared/logger", () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }),
  toErrorPayload: (error: unknown) => ({ message: String(error) }),
}));

describe("scrubEvent", () => {
  it("drops uploaded bodies and masks credentials", () => {
    const event: Parameters<typeof scrubEvent>[0] = {
      type: undefined,
      request: {
        url: "http://localhost:8000/analyze-image",
        data: "raw multipart body",
        headers: {
          Authorization: "Bearer test-secret",
          "Content-Type": "multipart/form-data",
        },
        cookies: { session: "test-session" },
      },
      extra: {
        apiToken: "test-secret",
        stage: "decoded",
      },
    };

    const scrubbed = scrubEvent(event);

    expect(scrubbed.request).toEqual({
      url: "http://localhost:8000/analyze-image",
      headers: {
        Authorization: "[redacted]",
        "Content-Type": "multipart/form-data",
      },
    });
    expect(scrubbed.extra).toEqual({
      apiToken: "[redacted]",
      stage: "decoded",
    });
  });
});

describe("captureException", () => {
  it("does nothing before Sentry is initialised", () => {
    expect(() => captureException(new Error("ignored"))).not.toThrow();
  });
});
