import { describe, test, expect } from "vitest";
import { SentenceChunker, chunkPages } from "../src/retrieval/chunker";

describe("SentenceChunker", () => {
  const chunker = new SentenceChunker();
  const paragraph =
    "First sentence is here. Second sentence follows it. Third one ends the paragraph.";

  test("should return no chunks for text under 50 characters", () => {
    expect(chunker.chunk("Too short to index.")).toEqual([]);
    expect(chunker.chunk("   ")).toEqual([]);
  });

  test("should keep the whole paragraph in one chunk under the default limit", () => {
    expect(chunker.chunk(paragraph)).toEqual([paragraph]);
  });

  test("should pack sentences greedily up to maxLength", () => {
    expect(chunker.chunk(paragraph, 60)).toEqual([
      "First sentence is here. Second sentence follows it.",
      "Third one ends the paragraph.",
    ]);
  });

  test("should collapse whitespace before splitting", () => {
    const messy = "First   sentence is\n here.\tSecond sentence follows it.  Third one ends the paragraph.";
    expect(chunker.chunk(messy, 60)).toEqual([
      "First sentence is here. Second sentence follows it.",
      "Third one ends the paragraph.",
    ]);
  });

  test("should split on question and exclamation marks", () => {
    const text = "Is the schedule published yet? Yes it is online now! Check the release notes page.";
    expect(chunker.chunk(text, 35)).toEqual([
      "Is the schedule published yet?",
      "Yes it is online now!",
      "Check the release notes page.",
    ]);
  });

  test("should emit an over-long sentence as its own chunk", () => {
    const long = "This particular sentence keeps going well past the configured limit without any stop";
    const chunks = chunker.chunk(`Short intro sentence here. ${long}`, 40);

    expect(chunks).toEqual(["Short intro sentence here.", long]);
  });

  test("should cover the text in order without empty chunks", () => {
    const text = Array(20).fill("This is a sentence that repeats.").join(" ");
    const chunks = chunker.chunk(text, 100);

    expect(chunks).toHaveLength(7);
    expect(chunks.every(chunk => chunk.length > 0 && chunk.length <= 100)).toBe(true);
    expect(chunks.join(" ")).toBe(text);
  });
});

describe("chunkPages", () => {
  test("should tag every chunk with its page and skip blank pages", () => {
    const chunker = new SentenceChunker(60);
    const chunks = chunkPages(
      [
        { url: "https://a.test/", content: "The first sentence is long enough here. The second one follows it closely." },
        { url: "https://a.test/empty", content: "   " },
        { url: "", content: "An unnamed page still carries enough words to chunk." },
      ],
      chunker
    );

    expect(chunks).toEqual([
      { text: "The first sentence is long enough here.", sourceUrl: "https://a.test/" },
      { text: "The second one follows it closely.", sourceUrl: "https://a.test/" },
      { text: "An unnamed page still carries enough words to chunk.", sourceUrl: "unknown" },
    ]);
  });
});
