import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { EventBus, type EventEnvelope } from "../eventBus";

describe("EventBus", () => {
  it("delivers an event to every subscriber of its type, in order", () => {
    const bus = new EventBus();
    const seen: string[] = [];
    bus.subscribe("session.reset", ({ data, sessionId }) => seen.push(`first ${sessionId} ${data.step}`));
    bus.subscribe("session.reset", ({ sessionId }) => seen.push(`second ${sessionId}`));
    bus.subscribe("sanction.generated", () => seen.push("wrong type"));

    bus.publish("session.reset", { step: "ASK_TENURE" }, "s-1");

    assert.deepEqual(seen, ["first s-1 ASK_TENURE", "second s-1"]);
  });

  it("hands subscribers the full envelope", () => {
    const bus = new EventBus();
    const received: EventEnvelope<"conversation.transition">[] = [];
    bus.subscribe("conversation.transition", event => received.push(event));

    bus.publish("conversation.transition", { from: "GREETING", to: "ASK_AMOUNT", event: "GREETED" }, "s-2");

    assert.deepEqual(received, [
      {
        type: "conversation.transition",
        data: { from: "GREETING", to: "ASK_AMOUNT", event: "GREETED" },
        sessionId: "s-2",
      },
    ]);
  });

  it("publishes to nobody without complaint", () => {
    assert.doesNotThrow(() => new EventBus().publish("session.reset", { step: "ENDED" }, "s-3"));
  });
});
