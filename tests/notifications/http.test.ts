import { describe, it, expect, afterEach, vi } from "vitest";
import { HttpEmailRelay, HttpPushTopic } from "../../src/notifications/http.js";
import { UpstreamError } from "../../src/errors.js";

const message = {
  from: "tasks@example.com",
  to: "member1@example.com",
  subject: "New Task Assigned to You",
  text: "Hello",
};

describe("HTTP channels", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the message as JSON with the API key", async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 202 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await new HttpEmailRelay({ endpoint: "https://mail.example.com/send", apiKey: "test-key" }).send(
      message,
    );

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://mail.example.com/send");
    expect(init?.method).toBe("POST");
    const headers = new Headers(init?.headers);
    expect(headers.get("Content-Type")).toBe("application/json");
    expect(headers.get("Authorization")).toBe("Bearer test-key");
    expect(init?.body).toBe(JSON.stringify(message));
  });

  it("omits the Authorization header without an API key", async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    await new HttpPushTopic({ endpoint: "https://push.example.com/topics/tasks" }).publish({
      event: "deadline_approaching",
      task_id: "t1",
      subject: "s",
      message: "m",
      recipients: ["m1"],
    });

    const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
    expect(headers.has("Authorization")).toBe(false);
  });

  it("releases the response body on success and on error statuses", async () => {
    const accepted = new Response("queued", { status: 202 });
    const rejected = new Response("nope", { status: 500 });
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValueOnce(accepted).mockResolvedValueOnce(rejected),
    );

    const relay = new HttpEmailRelay({ endpoint: "https://mail.example.com/send" });
    await relay.send(message);
    await expect(relay.send(message)).rejects.toThrow("email relay: responded with HTTP 500");

    expect(accepted.bodyUsed).toBe(true);
    expect(rejected.bodyUsed).toBe(true);
  });

  it("turns error statuses into upstream errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("nope", { status: 503 })));

    const relay = new HttpEmailRelay({ endpoint: "https://mail.example.com/send" });
    await expect(relay.send(message)).rejects.toThrow(
      new UpstreamError("email relay", "responded with HTTP 503"),
    );
  });

  it("turns network failures into upstream errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const topic = new HttpPushTopic({ endpoint: "https://push.example.com/topics/tasks" });
    await expect(
      topic.publish({ event: "status_changed", task_id: "t1", subject: "s", message: "m", recipients: [] }),
    ).rejects.toThrow("push topic: fetch failed");
  });

  it("aborts requests that exceed the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      ),
    );

    const relay = new HttpEmailRelay({ endpoint: "https://mail.example.com/send", timeoutMs: 10 });
    await expect(relay.send(message)).rejects.toThrow("email relay: request timed out");
  });
});
