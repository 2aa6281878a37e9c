/**
 * tidewatch — tests/features/lookup/urban.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { definitionEmbed, searchUrban, stripBrackets } from "../../../src/features/lookup/urban.js";

const entry = {
  word: "yeet",
  definition: "To [throw] something",
  example: "He [yeeted] the ball",
  permalink: "https://urban.example/yeet",
  thumbs_up: 10,
  thumbs_down: 1,
};

describe("stripBrackets", () => {
  it("removes link brackets but keeps the text", () => {
    expect(stripBrackets("a [b] c [d e]")).toBe("a b c d e");
  });
});

describe("definitionEmbed", () => {
  it("renders the definition, example and votes", () => {
    const json = definitionEmbed(entry).toJSON();

    expect(json.title).toBe("yeet");
    expect(json.url).toBe("https://urban.example/yeet");
    expect(json.description).toBe("To throw something\n\n**Example:** He yeeted the ball");
    expect(json.footer?.text).toBe("1 Down / 10 Up, Powered by Urban Dictionary.");
  });

  it("shows N/A without an example", () => {
    expect(definitionEmbed({ ...entry, example: null }).toJSON().description).toBe(
      "To throw something\n\n**Example:** N/A"
    );
  });
});

describe("searchUrban", () => {
  it("queries the lowercased term", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ list: [entry, entry] })));
    vi.stubGlobal("fetch", fetchMock);

    const pages = await searchUrban("Yeet It");

    expect(pages).toHaveLength(2);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.urbandictionary.com/v0/define?term=yeet%20it");
  });

  it("treats a missing list as no results", async () => {
    vi.stubGlobal("fetch", vi.fn<typeof fetch>(async () => new Response(JSON.stringify({}))));
    await expect(searchUrban("nothing")).resolves.toEqual([]);
  });
});
