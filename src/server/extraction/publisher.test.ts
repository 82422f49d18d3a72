import { describe, expect, it } from "vitest";
import { Publisher, encodeEvent, subjectFor } from "./publisher.js";
import { PublishError } from "../../core/errors.js";
import { FakeBus } from "../../test-utils/index.js";

const payload = new TextEncoder().encode("12345");
const timestamp = new Date("2026-01-02T03:04:05.678Z");

const decode = (bytes: Uint8Array): unknown =>
  JSON.parse(new TextDecoder().decode(bytes));

describe("subjectFor", () => {
  it("should use the lowercase method name", () => {
    expect(subjectFor("uptime")).toBe("uptime");
    expect(subjectFor("GetPeerInfo")).toBe("getpeerinfo");
  });

  it("should nest below a prefix", () => {
    expect(subjectFor("getmempoolinfo", "rpc.node1")).toBe(
      "rpc.node1.getmempoolinfo",
    );
  });
});

describe("encodeEvent", () => {
  it("should produce the JSON envelope with a base64 payload", () => {
    const bytes = encodeEvent({ method: "uptime", payload, timestamp });

    expect(new TextDecoder().decode(bytes)).toBe(
      '{"method":"uptime","timestamp":"2026-01-02T03:04:05.678Z","payload":"MTIzNDU="}',
    );
  });
});

describe("Publisher", () => {
  it("should publish on the method's subject", async () => {
    const bus = new FakeBus();
    const publisher = new Publisher(bus);

    const result = await publisher.publish({ method: "uptime", payload, timestamp });

    expect(result).toEqual({ ok: true, subject: "uptime" });
    expect(bus.messages).toHaveLength(1);
    const message = bus.messages[0];
    expect(message?.subject).toBe("uptime");
    expect(message && decode(message.payload)).toEqual({
      method: "uptime",
      timestamp: "2026-01-02T03:04:05.678Z",
      payload: "MTIzNDU=",
    });
  });

  it("should apply the subject prefix", async () => {
    const bus = new FakeBus();
    const publisher = new Publisher(bus, "bitcoin.rpc");

    const result = await publisher.publish({
      method: "getnetworkinfo",
      payload,
      timestamp,
    });

    expect(result.subject).toBe("bitcoin.rpc.getnetworkinfo");
    expect(bus.onSubject("bitcoin.rpc.getnetworkinfo")).toHaveLength(1);
  });

  it("should return a PublishError instead of throwing", async () => {
    const bus = new FakeBus();
    bus.failWith = new Error("CONNECTION_CLOSED");
    const publisher = new Publisher(bus);

    const result = await publisher.publish({ method: "uptime", payload, timestamp });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PublishError);
    expect(result.error.subject).toBe("uptime");
    expect(result.error.message).toBe(
      "Failed to publish uptime event on uptime: CONNECTION_CLOSED",
    );
    expect(bus.messages).toHaveLength(0);
  });
});
