import { describe, it, expect } from "vitest";
import { parsePitSelection, parsePlayAgain, pitPrompt } from "../src/ui/prompts";

describe("parsePitSelection", () => {
  it("maps pit letters to slot indexes, ignoring case and whitespace", () => {
    expect(parsePitSelection("a")).toEqual({ kind: "move", pit: 0 });
    expect(parsePitSelection(" F ")).toEqual({ kind: "move", pit: 5 });
    expect(parsePitSelection("g")).toEqual({ kind: "move", pit: 7 });
    expect(parsePitSelection("l")).toEqual({ kind: "move", pit: 12 });
  });

  it("q quits", () => {
    expect(parsePitSelection("q")).toEqual({ kind: "quit" });
    expect(parsePitSelection("Q")).toEqual({ kind: "quit" });
  });

  it("rejects anything but a single letter", () => {
    const single = { kind: "invalid", message: "Please enter a single letter." };

    expect(parsePitSelection("")).toEqual(single);
    expect(parsePitSelection("ab")).toEqual(single);
    expect(parsePitSelection("3")).toEqual(single);
    expect(parsePitSelection(".")).toEqual(single);
  });

  it("rejects letters that name no pit", () => {
    expect(parsePitSelection("z")).toEqual({
      kind: "invalid",
      message: "Please enter a letter corresponding to one of your non-empty pits.",
    });
  });

  it("leaves ownership to the engine: the other side's letters still parse", () => {
    expect(parsePitSelection("h")).toEqual({ kind: "move", pit: 8 });
  });
});

describe("parsePlayAgain", () => {
  it("reads the first character only", () => {
    expect(parsePlayAgain("y")).toEqual({ kind: "answer", again: true });
    expect(parsePlayAgain("Yes please")).toEqual({ kind: "answer", again: true });
    expect(parsePlayAgain("nope")).toEqual({ kind: "answer", again: false });
  });

  it("asks again on anything else", () => {
    expect(parsePlayAgain("")).toEqual({ kind: "invalid", message: "Please type 'y' or 'n'." });
    expect(parsePlayAgain("maybe")).toEqual({ kind: "invalid", message: "Please type 'y' or 'n'." });
  });
});

describe("pitPrompt", () => {
  it("addresses the player by name", () => {
    expect(pitPrompt("Ann")).toBe("Ann, select one of your pits that is not empty (or enter q to quit): ");
  });
});
