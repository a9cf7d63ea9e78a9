import { describe, it, expect } from "vitest";
import { foldForMatching } from "./normalizeText.js";

describe("foldForMatching", () => {
  it("lower-cases", () => {
    expect(foldForMatching("I Can't Go On")).toBe("i can't go on");
  });

  it("folds typographic apostrophes to '", () => {
    expect(foldForMatching("can’t go on")).toBe("can't go on");
    expect(foldForMatching("can‘t")).toBe("can't");
  });

  it("keeps spacing and punctuation", () => {
    expect(foldForMatching("  Self-Harm?! ")).toBe("  self-harm?! ");
  });
});
