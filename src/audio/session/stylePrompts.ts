/**
 * Style prompt "dice": short (1-3 word) prompts drawn from word pools,
 * cycling instrument -> vibe -> genre on each roll.
 */

import { clamp } from "@/audio/params/ranges";
import pools from "./stylePrompts.json";

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

export type StyleCategory = "instrument" | "vibe" | "genre";

export const STYLE_CATEGORIES: readonly StyleCategory[] = ["instrument", "vibe", "genre"];

export const MAX_PROMPT_WORDS = 3;

interface StylePromptPools {
  instruments: string[];
  vibes: string[];
  genres: string[];
  microGenres: string[];
  genreQualifiers: string[];
  genericTechniques: string[];
  instrumentDescriptors: Partial<Record<string, string[]>>;
}

const POOLS: StylePromptPools = pools;

// Typed prompts can say "jazz"; the dice never does.
const DICE_GENRES = POOLS.genres.filter((g) => g.toLowerCase() !== "jazz");

const INSTRUMENT_DESCRIPTOR_CHANCE = 0.45;
const MICRO_GENRE_CHANCE = 0.65;
const GENRE_QUALIFIER_CHANCE = 0.3;

function pick(pool: readonly string[], random: RandomSource, fallback: string): string {
  if (pool.length === 0) return fallback;
  const index = Math.min(Math.floor(random() * pool.length), pool.length - 1);
  return pool[index];
}

function chance(p: number, random: RandomSource): boolean {
  return random() < clamp(p, 0, 1);
}

/** Join the words of `parts` and keep at most `max` of them. */
export function clipWords(parts: readonly string[], max = MAX_PROMPT_WORDS): string {
  return parts
    .flatMap((part) => part.split(" ").filter((word) => word.length > 0))
    .slice(0, max)
    .join(" ");
}

/** An instrument, sometimes with a playing descriptor in front ("palm-muted electric guitar"). */
export function randomInstrument(random: RandomSource = Math.random): string {
  const instrument = pick(POOLS.instruments, random, "electric guitar");
  if (!chance(INSTRUMENT_DESCRIPTOR_CHANCE, random)) return instrument;

  const descriptors = POOLS.instrumentDescriptors[instrument] ?? POOLS.genericTechniques;
  return clipWords([pick(descriptors, random, "arpeggio"), instrument]);
}

export function randomVibe(random: RandomSource = Math.random): string {
  return pick(POOLS.vibes, random, "warmup");
}

/** Mostly a micro-genre; otherwise a base genre, sometimes qualified ("dub techno"). */
export function randomGenre(random: RandomSource = Math.random): string {
  if (chance(MICRO_GENRE_CHANCE, random)) {
    return pick(POOLS.microGenres, random, "breakbeat");
  }
  const base = pick(DICE_GENRES, random, "electronic");
  if (chance(GENRE_QUALIFIER_CHANCE, random)) {
    return clipWords([pick(POOLS.genreQualifiers, random, "deep"), base]);
  }
  return base;
}

const PICKERS: Record<StyleCategory, (random: RandomSource) => string> = {
  instrument: randomInstrument,
  vibe: randomVibe,
  genre: randomGenre,
};

export interface StyleCycler {
  /** Roll the current category, then advance to the next one. */
  next(): string;
  currentCategory(): StyleCategory;
  /** Back to "instrument". */
  reset(): void;
}

export function createStyleCycler(random: RandomSource = Math.random): StyleCycler {
  let index = 0;
  return {
    next() {
      const category = STYLE_CATEGORIES[index];
      index = (index + 1) % STYLE_CATEGORIES.length;
      return PICKERS[category](random);
    },
    currentCategory: () => STYLE_CATEGORIES[index],
    reset() {
      index = 0;
    },
  };
}

/** Cycler shared by every dice button that is not given its own. */
export const sharedStyleCycler = createStyleCycler();
