import type { MatchCategory, MatchSummary, TeamRef, VenueRef } from '../types';
import {
  firstPresent,
  identifierOrNull,
  isRecord,
  recordOrEmpty,
  stringOrNull,
  type JsonRecord
} from '../utils/records';

export const PRIMARY_MATCH_PATHS: Record<MatchCategory, string> = {
  live: 'livescores',
  upcoming: 'fixtures',
  completed: 'fixtures/finished'
};

export const ALTERNATE_MATCH_PATHS: Record<MatchCategory, string> = {
  live: 'matches/v1/live',
  upcoming: 'matches/v1/upcoming',
  completed: 'matches/v1/recent'
};

function upperStatus(value: unknown, category: MatchCategory): string {
  const status = stringOrNull(value);
  return (status || category).toUpperCase();
}

// ---------- SportMonks ----------

function primaryTeam(value: unknown): TeamRef {
  const team = recordOrEmpty(value);
  return {
    id: identifierOrNull(team.id),
    name: stringOrNull(team.name),
    code: stringOrNull(team.code)
  };
}

export function normalizePrimaryMatch(raw: JsonRecord, category: MatchCategory): MatchSummary {
  const venue = recordOrEmpty(raw.venue);

  return {
    id: identifierOrNull(raw.id),
    status: upperStatus(raw.status, category),
    note: stringOrNull(raw.note),
    runs: raw.runs ?? null,
    league_id: identifierOrNull(raw.season_id),
    localteam: primaryTeam(raw.localteam),
    visitorteam: primaryTeam(raw.visitorteam),
    venue: { name: stringOrNull(venue.name), city: stringOrNull(venue.city) },
    starting_at: stringOrNull(raw.starting_at)
  };
}

/** `data` ausente é lista vazia; itens que não são objetos são descartados. */
export function extractPrimaryMatches(payload: unknown): JsonRecord[] {
  const data = recordOrEmpty(payload).data;
  return Array.isArray(data) ? data.filter(isRecord) : [];
}

// ---------- Cricbuzz (RapidAPI) ----------

function alternateTeam(value: unknown): TeamRef {
  const team = recordOrEmpty(value);
  return {
    id: identifierOrNull(team.teamId),
    name: stringOrNull(team.teamName),
    code: stringOrNull(team.teamSName)
  };
}

function alternateVenue(value: unknown): VenueRef {
  const venue = recordOrEmpty(value);
  return { name: stringOrNull(venue.ground), city: stringOrNull(venue.city) };
}

export function normalizeAlternateMatch(raw: JsonRecord, category: MatchCategory): MatchSummary {
  return {
    id: identifierOrNull(firstPresent(raw.matchId, raw.id)),
    status: upperStatus(firstPresent(raw.matchState, raw.status), category),
    note: stringOrNull(raw.seriesName),
    runs: null,
    league_id: identifierOrNull(raw.seriesId),
    localteam: alternateTeam(raw.team1),
    visitorteam: alternateTeam(raw.team2),
    venue: alternateVenue(raw.venueInfo),
    starting_at: stringOrNull(raw.startTime)
  };
}

/**
 * O formato da lista depende do host contratado: às vezes vem em `matches`,
 * às vezes o próprio payload já é o array.
 */
export function extractAlternateMatches(payload: unknown): JsonRecord[] {
  const items = isRecord(payload) && payload.matches !== undefined ? payload.matches : payload;
  if (!Array.isArray(items)) {
    throw new Error('Unexpected match list payload from alternate provider');
  }
  return items.filter(isRecord);
}
