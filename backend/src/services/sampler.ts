import type { RandomSource } from "../types.js";

function randomIndex(length: number, random: RandomSource): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i -= 1) {
    const j = randomIndex(i + 1, random);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Picks `count` highlights, preferring one per title before repeating a book.
 *
 * Greedy: every title gets at most one pick in the first pass, then the
 * remainder is filled uniformly from whatever is left. With a heavily skewed
 * pool this spreads picks across books but is not an optimal diversity
 * schedule.
 */
export function sampleHighlights<T extends { title: string }>(
  pool: readonly T[],
  count: number,
  random: RandomSource = Math.random
): T[] {
  const target = Math.max(0, Math.floor(count));
  if (pool.length <= target) {
    return shuffle(pool, random);
  }

  const groups = new Map<string, number[]>();
  pool.forEach((highlight, index) => {
    const members = groups.get(highlight.title);
    if (members) {
      members.push(index);
    } else {
      groups.set(highlight.title, [index]);
    }
  });

  const chosen = new Set<number>();
  for (const title of shuffle(Array.from(groups.keys()), random)) {
    if (chosen.size >= target) {
      break;
    }
    const members = groups.get(title) ?? [];
    if (members.length > 0) {
      chosen.add(members[randomIndex(members.length, random)]);
    }
  }

  if (chosen.size < target) {
    const remaining = shuffle(
      pool.map((_, index) => index).filter((index) => !chosen.has(index)),
      random
    );
    for (const index of remaining.slice(0, target - chosen.size)) {
      chosen.add(index);
    }
  }

  return shuffle(
    Array.from(chosen, (index) => pool[index]),
    random
  );
}
