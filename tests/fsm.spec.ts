import { canTransition, findPath, getTimeoutSeconds, isPersistent, isTerminal } from "../src/core/fsm.js";
import { CONVERSATION_STATES, type ConversationState } from "../src/types.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { test } from "./helpers/runner.js";

test("fsm: legal and illegal transitions", () => {
  assert(canTransition("idle", "collecting_intent"), "idle -> collecting_intent");
  assert(canTransition("confirm_booking", "booking_in_progress"), "confirm -> in progress");
  assert(canTransition("booking_done", "serial_booking"), "done -> serial");
  assert(!canTransition("idle", "confirm_booking"), "idle cannot jump to confirm");
  assert(!canTransition("booking_done", "cancel_flow"), "done has no direct cancel");
  assert(!canTransition("admin_responding", "handoff_to_admin"), "admin_responding only goes idle");
});

const EXPECTED_EDGES: Record<ConversationState, ConversationState[]> = {
  idle: ["collecting_intent", "cancel_flow", "handoff_to_admin"],
  collecting_intent: [
    "browsing_schedule",
    "collecting_group",
    "collecting_datetime",
    "collecting_contact",
    "idle",
    "cancel_flow",
    "handoff_to_admin"
  ],
  browsing_schedule: ["collecting_group", "idle", "cancel_flow", "handoff_to_admin"],
  collecting_group: ["collecting_datetime", "idle", "cancel_flow", "handoff_to_admin"],
  collecting_datetime: ["collecting_contact", "idle", "cancel_flow", "handoff_to_admin"],
  collecting_contact: ["confirm_booking", "idle", "cancel_flow", "handoff_to_admin"],
  confirm_booking: ["booking_in_progress", "idle", "cancel_flow", "handoff_to_admin"],
  booking_in_progress: ["booking_done", "idle", "handoff_to_admin"],
  booking_done: ["idle", "serial_booking"],
  cancel_flow: ["idle", "handoff_to_admin"],
  serial_booking: ["collecting_group", "idle", "handoff_to_admin"],
  handoff_to_admin: ["admin_responding", "idle"],
  admin_responding: ["idle"]
};

test("fsm: every state pair is either a listed edge or rejected", () => {
  let checked = 0;
  for (const from of CONVERSATION_STATES) {
    for (const to of CONVERSATION_STATES) {
      assertEqual(canTransition(from, to), EXPECTED_EDGES[from].includes(to), `${from} -> ${to}`);
      checked += 1;
    }
  }
  assertEqual(checked, 169, "13 x 13 pairs");
});

test("fsm: every non-idle state can return to idle", () => {
  for (const state of CONVERSATION_STATES) {
    if (state === "idle") continue;
    assert(canTransition(state, "idle"), `${state} -> idle`);
  }
});

test("fsm: state timeouts", () => {
  assertEqual(getTimeoutSeconds("confirm_booking"), 10_800, "confirm_booking 3h");
  assertEqual(getTimeoutSeconds("booking_in_progress"), 30, "booking_in_progress 30s");
  assertEqual(getTimeoutSeconds("admin_responding"), 14_400, "admin_responding 4h");
  assertEqual(getTimeoutSeconds("handoff_to_admin"), undefined, "handoff has no state timeout");
  assertEqual(getTimeoutSeconds("idle"), undefined, "idle has no state timeout");
  assert(isTerminal("booking_done"), "booking_done is terminal");
  assert(isPersistent("handoff_to_admin") && isPersistent("admin_responding"), "admin states persist");
});

test("fsm: findPath skips slot states without passing through escape or commit states", () => {
  assertDeepEqual(findPath("idle", "idle"), [], "already there");
  assertDeepEqual(findPath("collecting_intent", "confirm_booking"), ["collecting_contact", "confirm_booking"], "intent -> confirm");
  assertDeepEqual(
    findPath("collecting_group", "confirm_booking"),
    ["collecting_datetime", "collecting_contact", "confirm_booking"],
    "group -> confirm"
  );
  assertDeepEqual(
    findPath("idle", "confirm_booking"),
    ["collecting_intent", "collecting_contact", "confirm_booking"],
    "idle -> confirm"
  );
  assertDeepEqual(
    findPath("booking_done", "confirm_booking"),
    ["serial_booking", "collecting_group", "collecting_datetime", "collecting_contact", "confirm_booking"],
    "serial booking path"
  );
  assertEqual(findPath("admin_responding", "collecting_group"), undefined, "admin_responding has no forward path");
  assertDeepEqual(findPath("collecting_contact", "idle"), ["idle"], "escape state allowed as the target");
  assertEqual(findPath("collecting_contact", "collecting_group"), undefined, "no loop through the commit states");
  assertEqual(findPath("confirm_booking", "serial_booking"), undefined, "a booking is never completed implicitly");
});
