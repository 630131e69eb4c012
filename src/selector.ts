import { sample, type RandomSource } from './random.js';
import type { Listing } from './store/types.js';

function uniqueById(listings: readonly Listing[]): Listing[] {
  const seen = new Set<number>();
  return listings.filter((l) => {
    if (seen.has(l.id)) return false;
    seen.add(l.id);
    return true;
  });
}

/**
 * Picks up to `targetCount` vacancies for one post.
 *
 * Salaried vacancies are sampled first, the rest of the batch is filled with
 * vacancies that have no `salary_to_net`. Sampling is uniform so the same
 * top-paying ads don't win every run. Salaried ones come first, highest pay on
 * top; the others keep their sampled order.
 */
export function selectListings(
  eligible: readonly Listing[],
  targetCount: number,
  random: RandomSource
): Listing[] {
  if (targetCount <= 0 || eligible.length === 0) return [];

  const pool = uniqueById(eligible);
  const withSalary = pool.filter((l) => l.salary_to_net != null);
  const withoutSalary = pool.filter((l) => l.salary_to_net == null);

  const salaried = sample(withSalary, targetCount, random);
  const rest = sample(withoutSalary, targetCount - salaried.length, random);

  salaried.sort((a, b) => (b.salary_to_net ?? 0) - (a.salary_to_net ?? 0));

  return [...salaried, ...rest].slice(0, targetCount);
}
