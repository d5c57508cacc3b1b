import { describe, it, expect } from "vitest";
import {
  isBlockedError,
  isDeleteForbidden,
  isMessageGone,
  isPeerInvalid,
  retryAfterSeconds,
  telegramFailure,
} from "../src/lib/tgErrors";
import { tgError } from "./fakes";

describe("Bot API error classification", () => {
  it("reads the response body", () => {
    expect(telegramFailure(tgError(429, "Too Many Requests", 7))).toEqual({
      code: 429,
      description: "Too Many Requests",
      retryAfter: 7,
    });
    expect(telegramFailure(new Error("socket hang up"))).toBeNull();
    expect(telegramFailure("nope")).toBeNull();
  });

  it("recognises blocked and unknown peers", () => {
    expect(isBlockedError(tgError(403, "Forbidden: bot was blocked by the user"))).toBe(true);
    expect(isPeerInvalid(tgError(400, "Bad Request: chat not found"))).toBe(true);
    expect(isPeerInvalid(tgError(400, "Bad Request: PEER_ID_INVALID"))).toBe(true);
    expect(isPeerInvalid(tgError(400, "Bad Request: message text is empty"))).toBe(false);
  });

  it("separates missing messages from undeletable ones", () => {
    const gone = tgError(400, "Bad Request: message to delete not found");
    const stuck = tgError(400, "Bad Request: message can't be deleted");
    expect(isMessageGone(gone)).toBe(true);
    expect(isDeleteForbidden(gone)).toBe(false);
    expect(isMessageGone(stuck)).toBe(false);
    expect(isDeleteForbidden(stuck)).toBe(true);
  });

  it("returns the flood wait, defaulting to one second", () => {
    expect(retryAfterSeconds(tgError(429, "Too Many Requests", 3))).toBe(3);
    expect(retryAfterSeconds(tgError(429, "Too Many Requests"))).toBe(1);
    expect(retryAfterSeconds(tgError(400, "Bad Request"))).toBeNull();
  });
});
