import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { InvalidTransitionError, getNextStep, transitionSession } from "../stateMachine";
import { makeSession } from "../../test/fixtures";
import type { ConversationEvent, ConversationStep } from "../../types/types";

function walk(events: ConversationEvent[]): ConversationStep[] {
  const session = makeSession();
  return events.map(event => transitionSession(session, event));
}

describe("transitionSession", () => {
  it("walks the approval path from greeting to completion", () => {
    assert.deepEqual(
      walk(["GREETED", "AMOUNT_CAPTURED", "TENURE_CAPTURED", "LOAN_CONFIRMED", "CUSTOMER_FOUND", "IDENTITY_CONFIRMED", "LOAN_APPROVED"]),
      ["ASK_AMOUNT", "ASK_TENURE", "CONFIRM_LOAN", "ASK_PHONE", "CONFIRM_IDENTITY", "UNDERWRITING", "COMPLETED"],
    );
  });

  it("loops back to underwriting once a salary slip arrives", () => {
    const session = makeSession({ step: "UNDERWRITING" });
    assert.equal(transitionSession(session, "SALARY_SLIP_REQUESTED"), "AWAITING_SALARY_SLIP");
    assert.equal(transitionSession(session, "SALARY_SLIP_RECEIVED"), "UNDERWRITING");
    assert.equal(transitionSession(session, "LOAN_REJECTED"), "ENDED");
  });

  it("records each step with its event in the history", () => {
    const session = makeSession({ step: "ASK_PHONE" });
    transitionSession(session, "CUSTOMER_MISSING");
    transitionSession(session, "RETRY_PHONE");

    assert.equal(session.step, "ASK_PHONE");
    assert.deepEqual(
      session.history.map(({ step, event }) => ({ step, event })),
      [
        { step: "CUSTOMER_NOT_FOUND", event: "CUSTOMER_MISSING" },
        { step: "ASK_PHONE", event: "RETRY_PHONE" },
      ],
    );
    assert.ok(session.history.every(entry => !Number.isNaN(Date.parse(entry.timestamp))));
  });

  it("leaves the session untouched when the event is not allowed", () => {
    const session = makeSession({ step: "ASK_AMOUNT" });
    assert.throws(() => transitionSession(session, "LOAN_APPROVED"), InvalidTransitionError);
    assert.equal(session.step, "ASK_AMOUNT");
    assert.deepEqual(session.history, []);
  });
});

describe("getNextStep", () => {
  it("routes the exits of each branching step", () => {
    assert.equal(getNextStep("CONFIRM_LOAN", "LOAN_CANCELLED"), "ENDED");
    assert.equal(getNextStep("CUSTOMER_NOT_FOUND", "GAVE_UP"), "ENDED");
    assert.equal(getNextStep("CONFIRM_IDENTITY", "IDENTITY_REJECTED"), "ASK_PHONE");
  });

  it("has no exits from the terminal steps", () => {
    for (const step of ["COMPLETED", "ENDED"] as const) {
      assert.throws(
        () => getNextStep(step, "GREETED"),
        (err: unknown) => err instanceof InvalidTransitionError && err.from === step && err.event === "GREETED",
      );
    }
  });

  it("names the step and event in the error message", () => {
    assert.throws(() => getNextStep("GREETING", "LOAN_CONFIRMED"), {
      message: "Invalid transition: GREETING -> LOAN_CONFIRMED",
    });
  });
});
