import type { MatchRecord, StrengthTable } from '@scoreline/shared';
import { SCORING, getOrDefault, isCompleted } from '@scoreline/shared';

interface TeamTally {
    scored: number;
    conceded: number;
    played: number;
}

/**
 * Attack/defense multipliers from raw per-match averages.
 *
 * A single aggregation pass: each factor is the team's goals-per-match
 * divided by the league average, with no opponent adjustment or iteration.
 * Every team named in `matches` gets an entry; rows without a result only
 * register the team, so a team seen solely in such rows is neutral (1.0).
 *
 * Pure: the same input always yields the same table.
 */
export function fitStrengths(matches: readonly MatchRecord[]): StrengthTable {
    const tallies = new Map<string, TeamTally>();
    const tally = (team: string): TeamTally => {
        let entry = tallies.get(team);
        if (!entry) {
            entry = { scored: 0, conceded: 0, played: 0 };
            tallies.set(team, entry);
        }
        return entry;
    };

    let totalGoals = 0;
    let appearances = 0;

    for (const match of matches) {
        const home = tally(match.home_team);
        const away = tally(match.away_team);
        if (!isCompleted(match)) continue;

        home.scored += match.home_goals;
        home.conceded += match.away_goals;
        home.played++;

        away.scored += match.away_goals;
        away.conceded += match.home_goals;
        away.played++;

        totalGoals += match.home_goals + match.away_goals;
        appearances += 2;
    }

    // Empty (or goalless) history falls back to the default rate
    const leagueAverage = totalGoals > 0
        ? totalGoals / appearances
        : SCORING.DEFAULT_LEAGUE_AVERAGE_GOALS;

    const attack = new Map<string, number>();
    const defense = new Map<string, number>();

    for (const [team, { scored, conceded, played }] of tallies) {
        if (played === 0) {
            attack.set(team, SCORING.NEUTRAL_FACTOR);
            defense.set(team, SCORING.NEUTRAL_FACTOR);
            continue;
        }
        attack.set(team, (scored / played) / leagueAverage);
        defense.set(team, (conceded / played) / leagueAverage);
    }

    return { attack, defense, league_average_goals: leagueAverage };
}

export function attackFactor(strengths: StrengthTable, team: string): number {
    return getOrDefault(strengths.attack, team, SCORING.NEUTRAL_FACTOR);
}

export function defenseFactor(strengths: StrengthTable, team: string): number {
    return getOrDefault(strengths.defense, team, SCORING.NEUTRAL_FACTOR);
}
