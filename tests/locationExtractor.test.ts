import { describe, it, expect } from "vitest";
import { extractLocation } from "../src/pipeline/locationExtractor.js";

describe("extractLocation", () => {
  it("takes the longest venue name after a locative verb", () => {
    expect(extractLocation("明天下午兩點在公司會議室開會，記得帶筆電")).toBe("公司會議室");
  });

  it("stops at the next locative verb", () => {
    expect(extractLocation("先在公司開會再去機場")).toBe("公司");
  });

  it("finds a numbered room without a locative verb", () => {
    expect(extractLocation("下週一早上九點半301會議室開會")).toBe("301會議室");
  });

  it("reads capitalised English places", () => {
    expect(extractLocation("lunch with Amy at the Grand Hotel tomorrow")).toBe("Grand Hotel");
  });

  it("does not take a weekday for a place", () => {
    expect(extractLocation("meet in Monday standup")).toBeNull();
  });

  it("returns null when no place is said", () => {
    expect(extractLocation("明天下午兩點開會")).toBeNull();
  });
});
