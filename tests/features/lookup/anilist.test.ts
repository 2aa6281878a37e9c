/**
 * tidewatch — tests/features/lookup/anilist.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import {
  ANILIST_URL,
  characterEmbed,
  cleanDescription,
  formatFuzzyDate,
  formatName,
  listMaximum,
  mediaEmbed,
  searchMedia,
  statusName,
  userEmbed,
  type AniListMedia,
} from "../../../src/features/lookup/anilist.js";

const bebop: AniListMedia = {
  id: 1,
  siteUrl: "https://anilist.co/anime/1",
  title: { romaji: null, english: "Cowboy Bebop", native: null },
  description: null,
  status: "FINISHED",
  episodes: 26,
  startDate: { year: 1998, month: 4, day: 3 },
  endDate: null,
  averageScore: 86,
  genres: ["Action", "Sci-Fi"],
  studios: { nodes: [{ name: "Sunrise" }] },
};

describe("anilist helpers", () => {
  it("names statuses", () => {
    expect(statusName("NOT_YET_RELEASED")).toBe("Not Yet Released");
    expect(statusName("SOMETHING_NEW")).toBe("Unknown");
    expect(statusName(null)).toBe("Unknown");
  });

  it("caps lists with a remainder count", () => {
    expect(listMaximum(["a", "b", "c", "d", "e", "f", "g"])).toEqual(["a", "b", "c", "d", "e", "+ 2 more"]);
    expect(listMaximum(["a", "b"])).toEqual(["a", "b"]);
  });

  it("joins name parts", () => {
    expect(formatName("Spike", "Spiegel")).toBe("Spike Spiegel");
    expect(formatName("Ein", null)).toBe("Ein");
    expect(formatName(null, undefined)).toBe("No name");
  });

  it("formats partial dates", () => {
    expect(formatFuzzyDate({ year: 1998, month: 4, day: 3 })).toBe("1998-04-03");
    expect(formatFuzzyDate({ year: 2021, month: 11, day: null })).toBe("2021-11");
    expect(formatFuzzyDate({ year: 2020, month: null, day: 5 })).toBe("2020");
    expect(formatFuzzyDate({ year: null })).toBe("Unknown");
    expect(formatFuzzyDate(null)).toBe("Unknown");
  });
});

describe("cleanDescription", () => {
  it("turns spoilers into spoiler tags and strips html", () => {
    expect(cleanDescription("Hello<br><br>World ~!secret!~ <i>x</i>")).toBe("Hello\nWorld ||secret|| x");
  });

  it("keeps at most five lines", () => {
    expect(cleanDescription("a\nb\nc\nd\ne\nf\ng")).toBe("a\nb\nc\nd\ne...");
  });

  it("keeps at most 400 characters", () => {
    expect(cleanDescription("x".repeat(450))).toBe(`${"x".repeat(400)}...`);
  });

  it("is empty for a missing description", () => {
    expect(cleanDescription(undefined)).toBe("");
  });
});

describe("embeds", () => {
  it("renders media", () => {
    const json = mediaEmbed(bebop, "ANIME").toJSON();

    expect(json.title).toBe("Cowboy Bebop");
    expect(json.url).toBe("https://anilist.co/anime/1");
    expect(json.description).toBeUndefined();
    expect(json.fields).toEqual([
      { name: "Type", value: "Anime", inline: true },
      { name: "Status", value: "Finished", inline: true },
      { name: "Episodes", value: "26", inline: true },
      { name: "Start Date", value: "1998-04-03", inline: true },
      { name: "End Date", value: "Unknown", inline: true },
      { name: "Score", value: "86/100", inline: true },
      { name: "Genres", value: "Action, Sci-Fi", inline: false },
      { name: "Studios", value: "Sunrise", inline: false },
    ]);
    expect(json.footer?.text).toBe("Powered by AniList");
  });

  it("renders characters with appearances and other names", () => {
    const json = characterEmbed({
      id: 2,
      name: { first: "Spike", last: "Spiegel", native: "スパイク", alternative: ["Swimming Bird"] },
      description: "Bounty hunter.",
      media: { nodes: [{ siteUrl: "https://anilist.co/anime/1", title: { romaji: "Cowboy Bebop" } }] },
    }).toJSON();

    expect(json.title).toBe("Spike Spiegel");
    expect(json.description).toBe("Bounty hunter.");
    expect(json.fields).toEqual([
      { name: "Appearances", value: "[Cowboy Bebop](https://anilist.co/anime/1)", inline: false },
      { name: "Other names", value: "Swimming Bird, スパイク", inline: false },
    ]);
  });

  it("renders user statistics", () => {
    const json = userEmbed({
      id: 3,
      name: "tester",
      statistics: { anime: { count: 12, minutesWatched: 14_400 }, manga: { count: 2, chaptersRead: 80 } },
    }).toJSON();

    expect(json.fields).toEqual([
      { name: "Anime watched", value: "12", inline: true },
      { name: "Days watched", value: "10.0", inline: true },
      { name: "Manga chapters read", value: "80", inline: true },
    ]);
  });
});

describe("searchMedia", () => {
  it("posts the GraphQL query and maps each result", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response(JSON.stringify({ data: { Page: { media: [bebop] } } }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const pages = await searchMedia("bebop", "ANIME");

    expect(pages.map((p) => p.toJSON().title)).toEqual(["Cowboy Bebop"]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(ANILIST_URL);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body)).variables).toEqual({ search: "bebop", type: "ANIME" });
  });

  it("returns no pages when AniList has no matches", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ data: { Page: { media: [] } } })))
    );
    await expect(searchMedia("zzzz", "MANGA")).resolves.toEqual([]);
  });
});
