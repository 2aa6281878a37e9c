/**
 * tidewatch — src/features/lookup/anilist.ts
 * WHAT: AniList GraphQL searches (media, characters, users) rendered as embeds.
 * FLOWS: search*() → POST graphql.anilist.co → zod → *Embed() per result
 * DOCS:
 *  - AniList API v2: https://anilist.gitbook.io/anilist-apiv2-docs/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder } from "discord.js";
import { z } from "zod";
import { EMBED_COLOR_ANILIST } from "../../lib/constants.js";
import { truncate } from "../../lib/text.js";
import { fetchJson } from "./http.js";

export const ANILIST_URL = "https://graphql.anilist.co";

export type MediaKind = "ANIME" | "MANGA";

const MEDIA_QUERY = `
query ($search: String, $type: MediaType) {
  Page(page: 1, perPage: 10) {
    media(search: $search, type: $type) {
      id
      siteUrl
      title { romaji english native }
      description(asHtml: false)
      coverImage { large }
      status
      episodes
      chapters
      startDate { year month day }
      endDate { year month day }
      averageScore
      genres
      synonyms
      studios(isMain: true) { nodes { name } }
      externalLinks { url site }
    }
  }
}`;

const CHARACTER_QUERY = `
query ($search: String) {
  Page(page: 1, perPage: 10) {
    characters(search: $search) {
      id
      siteUrl
      name { first last native alternative }
      description(asHtml: false)
      image { large }
      media(perPage: 5) { nodes { siteUrl title { romaji english native } } }
    }
  }
}`;

const USER_QUERY = `
query ($search: String) {
  Page(page: 1, perPage: 10) {
    users(search: $search) {
      id
      name
      siteUrl
      about(asHtml: false)
      avatar { large }
      statistics {
        anime { count minutesWatched }
        manga { count chaptersRead }
      }
    }
  }
}`;

const titleSchema = z.object({
  romaji: z.string().nullish(),
  english: z.string().nullish(),
  native: z.string().nullish(),
});

const fuzzyDateSchema = z.object({
  year: z.number().nullish(),
  month: z.number().nullish(),
  day: z.number().nullish(),
});
export type FuzzyDate = z.infer<typeof fuzzyDateSchema>;

const mediaSchema = z.object({
  id: z.number(),
  siteUrl: z.string().nullish(),
  title: titleSchema,
  description: z.string().nullish(),
  coverImage: z.object({ large: z.string().nullish() }).nullish(),
  status: z.string().nullish(),
  episodes: z.number().nullish(),
  chapters: z.number().nullish(),
  startDate: fuzzyDateSchema.nullish(),
  endDate: fuzzyDateSchema.nullish(),
  averageScore: z.number().nullish(),
  genres: z.array(z.string()).nullish(),
  synonyms: z.array(z.string()).nullish(),
  studios: z.object({ nodes: z.array(z.object({ name: z.string() })) }).nullish(),
  externalLinks: z.array(z.object({ url: z.string(), site: z.string() })).nullish(),
});
export type AniListMedia = z.infer<typeof mediaSchema>;

const characterSchema = z.object({
  id: z.number(),
  siteUrl: z.string().nullish(),
  name: z.object({
    first: z.string().nullish(),
    last: z.string().nullish(),
    native: z.string().nullish(),
    alternative: z.array(z.string()).nullish(),
  }),
  description: z.string().nullish(),
  image: z.object({ large: z.string().nullish() }).nullish(),
  media: z.object({ nodes: z.array(z.object({ siteUrl: z.string().nullish(), title: titleSchema })) }).nullish(),
});
export type AniListCharacter = z.infer<typeof characterSchema>;

const userSchema = z.object({
  id: z.number(),
  name: z.string(),
  siteUrl: z.string().nullish(),
  about: z.string().nullish(),
  avatar: z.object({ large: z.string().nullish() }).nullish(),
  statistics: z
    .object({
      anime: z.object({ count: z.number(), minutesWatched: z.number() }),
      manga: z.object({ count: z.number(), chaptersRead: z.number() }),
    })
    .nullish(),
});
export type AniListUser = z.infer<typeof userSchema>;

const mediaPageSchema = z.object({
  data: z.object({ Page: z.object({ media: z.array(mediaSchema).nullish() }) }),
});
const characterPageSchema = z.object({
  data: z.object({ Page: z.object({ characters: z.array(characterSchema).nullish() }) }),
});
const userPageSchema = z.object({
  data: z.object({ Page: z.object({ users: z.array(userSchema).nullish() }) }),
});

const STATUS_NAMES: Record<string, string> = {
  FINISHED: "Finished",
  RELEASING: "Releasing",
  NOT_YET_RELEASED: "Not Yet Released",
  CANCELLED: "Cancelled",
  HIATUS: "Hiatus",
};

export function statusName(status: string | null | undefined): string {
  return (status && STATUS_NAMES[status]) || "Unknown";
}

/**
 * First `max` items, then "+ N more" for the rest.
 */
export function listMaximum(items: readonly string[], max = 5): string[] {
  if (items.length <= max) return [...items];
  return [...items.slice(0, max), `+ ${items.length - max} more`];
}

export function formatName(first: string | null | undefined, last: string | null | undefined): string {
  const parts = [first, last].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(" ") : "No name";
}

/**
 * Spoilers become Discord spoiler tags, HTML goes, and the result is cut to
 * 5 lines / 400 characters.
 */
export function cleanDescription(text: string | null | undefined): string {
  if (!text) return "";
  let cleaned = text
    .replace(/~!([\s\S]*?)!~/g, "||$1||")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]*>/g, "")
    .replace(/\n{2,}/g, "\n")
    .trim();

  let cut = false;
  const lines = cleaned.split("\n");
  if (lines.length > 5) {
    cleaned = lines.slice(0, 5).join("\n");
    cut = true;
  }
  if (cleaned.length > 400) {
    cleaned = cleaned.slice(0, 400);
    cut = true;
  }
  return cut ? `${cleaned}...` : cleaned;
}

export function formatFuzzyDate(date: FuzzyDate | null | undefined): string {
  if (!date?.year) return "Unknown";
  const pad = (n: number) => String(n).padStart(2, "0");
  const parts = [String(date.year)];
  if (date.month) parts.push(pad(date.month));
  if (date.month && date.day) parts.push(pad(date.day));
  return parts.join("-");
}

function preferredTitle(title: z.infer<typeof titleSchema>): string {
  return title.romaji || title.english || title.native || "Untitled";
}

function field(name: string, value: string, inline = true) {
  return { name, value: truncate(value || "N/A", 1024), inline };
}

function baseEmbed(title: string, url: string | null | undefined, description: string): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(EMBED_COLOR_ANILIST)
    .setTitle(truncate(title, 256))
    .setFooter({ text: "Powered by AniList" });
  if (url) embed.setURL(url);
  if (description) embed.setDescription(description);
  return embed;
}

export function mediaEmbed(media: AniListMedia, kind: MediaKind): EmbedBuilder {
  const embed = baseEmbed(preferredTitle(media.title), media.siteUrl, cleanDescription(media.description));
  if (media.coverImage?.large) embed.setThumbnail(media.coverImage.large);

  const count = kind === "ANIME" ? media.episodes : media.chapters;
  embed.addFields(
    field("Type", kind === "ANIME" ? "Anime" : "Manga"),
    field("Status", statusName(media.status)),
    field(kind === "ANIME" ? "Episodes" : "Chapters", count == null ? "N/A" : String(count)),
    field("Start Date", formatFuzzyDate(media.startDate)),
    field("End Date", formatFuzzyDate(media.endDate)),
    field("Score", media.averageScore == null ? "N/A" : `${media.averageScore}/100`)
  );

  const genres = media.genres ?? [];
  if (genres.length > 0) embed.addFields(field("Genres", listMaximum(genres).join(", "), false));

  const studios = media.studios?.nodes.map((s) => s.name) ?? [];
  if (studios.length > 0) embed.addFields(field("Studios", studios.join(", "), false));

  const links = media.externalLinks?.map((l) => `[${l.site}](${l.url})`) ?? [];
  if (links.length > 0) embed.addFields(field("External links", links.join(", "), false));

  const synonyms = media.synonyms ?? [];
  if (synonyms.length > 0) embed.addFields(field("Synonyms", listMaximum(synonyms).join(", "), false));

  return embed;
}

export function characterEmbed(character: AniListCharacter): EmbedBuilder {
  const { name } = character;
  const embed = baseEmbed(formatName(name.first, name.last), character.siteUrl, cleanDescription(character.description));
  if (character.image?.large) embed.setThumbnail(character.image.large);

  const appearances = (character.media?.nodes ?? []).slice(0, 5).map((node) => {
    const title = preferredTitle(node.title);
    return node.siteUrl ? `[${title}](${node.siteUrl})` : title;
  });
  if (appearances.length > 0) embed.addFields(field("Appearances", appearances.join("\n"), false));

  const otherNames = [...(name.alternative ?? []), ...(name.native ? [name.native] : [])].filter(Boolean);
  if (otherNames.length > 0) embed.addFields(field("Other names", listMaximum(otherNames).join(", "), false));

  return embed;
}

export function userEmbed(user: AniListUser): EmbedBuilder {
  const embed = baseEmbed(user.name, user.siteUrl, cleanDescription(user.about));
  if (user.avatar?.large) embed.setThumbnail(user.avatar.large);

  const stats = user.statistics;
  if (stats) {
    embed.addFields(
      field("Anime watched", String(stats.anime.count)),
      field("Days watched", (stats.anime.minutesWatched / 1440).toFixed(1)),
      field("Manga chapters read", String(stats.manga.chaptersRead))
    );
  }
  return embed;
}

async function query<T>(gql: string, variables: Record<string, string>, schema: z.ZodType<T>): Promise<T> {
  return fetchJson(ANILIST_URL, schema, "anilist", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ query: gql, variables }),
  });
}

export async function searchMedia(search: string, kind: MediaKind): Promise<EmbedBuilder[]> {
  const body = await query(MEDIA_QUERY, { search, type: kind }, mediaPageSchema);
  return (body.data.Page.media ?? []).map((m) => mediaEmbed(m, kind));
}

export async function searchCharacters(search: string): Promise<EmbedBuilder[]> {
  const body = await query(CHARACTER_QUERY, { search }, characterPageSchema);
  return (body.data.Page.characters ?? []).map(characterEmbed);
}

export async function searchUsers(search: string): Promise<EmbedBuilder[]> {
  const body = await query(USER_QUERY, { search }, userPageSchema);
  return (body.data.Page.users ?? []).map(userEmbed);
}
