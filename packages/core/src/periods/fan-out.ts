/**
 * Bounded parallel period resolution over (party × match).
 *
 * Each task writes only to its own slot; slots are merged afterwards in task
 * order, so the output does not depend on completion order.
 */

import pLimit from 'p-limit';
import { logger } from '../logger';
import type { InvestigatedParty, PartyPeriod, PeriodRequirement, SubsidyMatch } from '../types';
import { resolvePeriod } from './resolver';
import type { PeriodContext } from './resolver';

export const ANY_PARTY_KEY = '*';

export interface PeriodResolution {
  /** One entry per (party, match); per match with party '*' when no party was found. */
  periods: PartyPeriod[];
  /** Document-wide period per match, aligned with the input matches. */
  matchPeriods: PeriodRequirement[];
}

interface Task {
  party: InvestigatedParty | null;
  matchIndex: number;
}

export async function resolvePeriods(
  parties: readonly InvestigatedParty[],
  matches: readonly SubsidyMatch[],
  context: PeriodContext,
  concurrency: number
): Promise<PeriodResolution> {
  const limit = pLimit(concurrency);

  const tasks: Task[] = matches.map((_, matchIndex) => ({ party: null, matchIndex }));
  for (const party of parties) {
    matches.forEach((_, matchIndex) => tasks.push({ party, matchIndex }));
  }

  const slots: Array<PeriodRequirement | undefined> = new Array(tasks.length);

  await Promise.all(
    tasks.map((task, slot) =>
      limit(async () => {
        const match = matches[task.matchIndex];
        if (match) slots[slot] = resolvePeriod(task.party, match, context);
      })
    )
  );

  const matchPeriods: PeriodRequirement[] = [];
  const periods: PartyPeriod[] = [];

  tasks.forEach((task, slot) => {
    const period = slots[slot];
    const match = matches[task.matchIndex];
    if (!period || !match) return;

    if (task.party === null) {
      matchPeriods[task.matchIndex] = period;
      if (parties.length === 0) {
        periods.push({ party_key: ANY_PARTY_KEY, party_name: null, catalog_id: match.catalog_id, period });
      }
    } else {
      periods.push({
        party_key: task.party.key,
        party_name: task.party.name,
        catalog_id: match.catalog_id,
        period,
      });
    }
  });

  logger.debug('Periods resolved', { tasks: tasks.length, concurrency });

  return { periods, matchPeriods };
}
