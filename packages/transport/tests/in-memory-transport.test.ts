/**
 * InMemoryTransport tests
 *
 * Quoting, budget enforcement, refunds, and caller-controlled delivery
 * (in order, out of order, duplicate, failed-then-retried).
 */
import { describe, it, expect, beforeEach } from "vitest";
import type { MessageDelivery } from "@relaymint/types";
import { InMemoryTransport } from "../src/in-memory-transport.js";
import type { RefundChannel } from "../src/in-memory-transport.js";
import type { SendRequest } from "../src/types.js";
import { TransportError } from "../src/types.js";

class RecordingReceiver {
  readonly deliveries: MessageDelivery[] = [];
  failNext = false;

  receive(delivery: MessageDelivery): void {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("receiver unavailable");
    }
    this.deliveries.push(delivery);
  }
}

class RecordingRefunds implements RefundChannel {
  readonly refunds: Array<[string, bigint]> = [];
  refuse = false;

  send(to: string, amount: bigint): void {
    if (this.refuse) throw new Error("recipient refused");
    this.refunds.push([to, amount]);
  }
}

function request(overrides: Partial<SendRequest> = {}): SendRequest {
  return {
    sourceLedger: "origin",
    destinationLedger: "dest-a",
    sender: "0xcustodian",
    payload: '{"n":1}',
    feeBudget: 10n,
    refundAddress: "0xalice",
    ...overrides,
  };
}

describe("InMemoryTransport", () => {
  let receiver: RecordingReceiver;
  let refunds: RecordingRefunds;
  let transport: InMemoryTransport;

  beforeEach(() => {
    receiver = new RecordingReceiver();
    refunds = new RecordingRefunds();
    transport = new InMemoryTransport({
      deliveryCost: 4n,
      refundChannels: new Map([["origin", refunds]]),
    });
    transport.connect("dest-a", "0xissuer", receiver);
  });

  describe("wiring", () => {
    it("reports connected ledgers and their addresses", () => {
      expect(transport.isConnected("dest-a")).toBe(true);
      expect(transport.isConnected("dest-b")).toBe(false);
      expect(transport.addressOf("dest-a")).toBe("0xissuer");
    });

    it("rejects a second receiver for the same ledger", () => {
      expect(() => transport.connect("dest-a", "0xother", receiver)).toThrow(TransportError);
    });
  });

  describe("quote / send", () => {
    it("quotes the fixed delivery cost", () => {
      expect(transport.quote("dest-a", "{}")).toBe(4n);
    });

    it("supports a cost function", () => {
      const sized = new InMemoryTransport({
        deliveryCost: (_dest, payload) => BigInt(payload.length),
      });
      sized.connect("dest-a", "0xissuer", receiver);
      expect(sized.quote("dest-a", "abcde")).toBe(5n);
    });

    it("charges nothing without a configured cost", () => {
      const free = new InMemoryTransport();
      free.connect("dest-a", "0xissuer", receiver);
      expect(free.quote("dest-a", "{}")).toBe(0n);
    });

    it("rejects unknown destinations", () => {
      expect(() => transport.quote("dest-z", "{}")).toThrow(/No receiver connected/);
    });

    it("rejects a budget below the quote and queues nothing", () => {
      expect(() => transport.send(request({ feeBudget: 3n }))).toThrow(/costs 4, budget is 3/);
      expect(transport.sentCount).toBe(0);
      expect(refunds.refunds).toEqual([]);
    });

    it("refunds the unused budget to the refund address", () => {
      const handle = transport.send(request({ feeBudget: 10n }));
      expect(handle.deliveryCost).toBe(4n);
      expect(handle.refunded).toBe(6n);
      expect(refunds.refunds).toEqual([["0xalice", 6n]]);
    });

    it("does not refund an exact budget", () => {
      const handle = transport.send(request({ feeBudget: 4n }));
      expect(handle.refunded).toBe(0n);
      expect(refunds.refunds).toEqual([]);
    });

    it("reports a refused refund as REFUND_FAILED and queues nothing", () => {
      refunds.refuse = true;

      let caught: unknown;
      try {
        transport.send(request({ feeBudget: 10n }));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(TransportError);
      const error = caught as TransportError;
      expect(error.code).toBe("REFUND_FAILED");
      expect(error.message).toBe("Refunding 6 to 0xalice failed");
      expect((error.cause as Error).message).toBe("recipient refused");
      expect(transport.sentCount).toBe(0);
    });

    it("gives identical payloads distinct message ids", () => {
      const a = transport.send(request());
      const b = transport.send(request());
      expect(a.messageId).not.toBe(b.messageId);
      expect(transport.pending()).toHaveLength(2);
    });
  });

  describe("delivery", () => {
    it("delivers in send order with attested source and sender", () => {
      const first = transport.send(request({ payload: "a" }));
      transport.send(request({ payload: "b" }));

      const result = transport.deliverNext();
      expect(result).toEqual({ messageId: first.messageId, status: "delivered", attempt: 1 });
      expect(receiver.deliveries[0]).toEqual({
        messageId: first.messageId,
        sourceLedger: "origin",
        sender: "0xcustodian",
        payload: "a",
        attempt: 1,
      });
      expect(transport.pending()).toHaveLength(1);
      expect(transport.delivered()).toHaveLength(1);
    });

    it("delivers out of order on request", () => {
      transport.send(request({ payload: "a" }));
      const second = transport.send(request({ payload: "b" }));

      transport.deliver(second.messageId);
      transport.deliverAll();
      expect(receiver.deliveries.map((d) => d.payload)).toEqual(["b", "a"]);
    });

    it("returns undefined when nothing is pending", () => {
      expect(transport.deliverNext()).toBeUndefined();
    });

    it("keeps a failed delivery pending and retries it", () => {
      const handle = transport.send(request());
      receiver.failNext = true;

      const failed = transport.deliverNext();
      expect(failed?.status).toBe("failed");
      expect(transport.pending()).toHaveLength(1);
      expect(transport.lastError(handle.messageId)).toBeInstanceOf(Error);

      const retried = transport.deliver(handle.messageId);
      expect(retried).toEqual({ messageId: handle.messageId, status: "delivered", attempt: 2 });
      expect(transport.lastError(handle.messageId)).toBeUndefined();
    });

    it("redelivers a delivered message as a duplicate", () => {
      const handle = transport.send(request());
      transport.deliverNext();

      const duplicate = transport.redeliver(handle.messageId);
      expect(duplicate.attempt).toBe(2);
      expect(receiver.deliveries).toHaveLength(2);
      expect(receiver.deliveries[1]?.attempt).toBe(2);
    });

    it("refuses to redeliver a pending message or deliver a delivered one", () => {
      const handle = transport.send(request());
      expect(() => transport.redeliver(handle.messageId)).toThrow(/not been delivered/);
      transport.deliverNext();
      expect(() => transport.deliver(handle.messageId)).toThrow(/already delivered/);
    });

    it("rejects unknown message ids", () => {
      expect(() => transport.deliver("nope")).toThrow(/Unknown message/);
    });
  });
});
