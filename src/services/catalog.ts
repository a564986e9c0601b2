import type { Game, GameFilter, GameSortOrder } from '../models/game';
import { gameKey } from '../models/game';
import { NotFoundError } from '../models/errors';

const lower = (value: string) => value.toLowerCase();

const compareText = (a: string, b: string): number => {
  const left = lower(a);
  const right = lower(b);
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
};

const compareByTitle = (a: Game, b: Game): number =>
  compareText(a.title, b.title) || compareText(a.name, b.name);

const compareByPublishedDesc = (a: Game, b: Game): number =>
  b.publishedAt.getTime() - a.publishedAt.getTime() || compareText(a.title, b.title);

/**
 * Sorted copy of `games`. Default order is newest first, ties by title.
 */
export const sortGames = (games: readonly Game[], by: GameSortOrder = 'publishedAtDesc'): Game[] =>
  [...games].sort(by === 'title' ? compareByTitle : compareByPublishedDesc);

/**
 * Games matching every given criterion, in input order
 */
export const filterGames = (games: readonly Game[], filter: GameFilter = {}): Game[] => {
  const keyword = filter.keyword ? lower(filter.keyword) : undefined;
  const language = filter.language ? lower(filter.language) : undefined;
  const { repositoryName, onlyInstalled } = filter;

  return games.filter((game) => {
    if (keyword && !lower(game.name).includes(keyword) && !lower(game.title).includes(keyword)) {
      return false;
    }
    if (repositoryName && game.repositoryName !== repositoryName) {
      return false;
    }
    if (language && !game.languages.some((lang) => lower(lang) === language)) {
      return false;
    }
    return !onlyInstalled || game.installed;
  });
};

/**
 * Distinct languages of `games`, sorted; the first casing seen is kept
 */
export const findLanguages = (games: readonly Game[]): string[] => {
  const seen = new Map<string, string>();
  for (const game of games) {
    for (const lang of game.languages) {
      if (!seen.has(lower(lang))) {
        seen.set(lower(lang), lang);
      }
    }
  }
  return [...seen.values()].sort(compareText);
};

/**
 * Picks the candidate whose name equals `keyword`, or the first candidate.
 */
export const resolveByKeyword = (candidates: readonly Game[], keyword: string): Game => {
  if (candidates.length === 0) {
    throw new NotFoundError(`Game "${keyword}" has not been found`);
  }
  const exact = candidates.find((game) => lower(game.name) === lower(keyword));
  return exact ?? candidates[0];
};

/**
 * Immutable snapshot of all games from the last successful sync
 */
export class Catalog {
  public readonly games: readonly Game[];
  private readonly byKey: ReadonlyMap<string, Game>;
  private readonly colliding: ReadonlySet<string>;

  constructor(games: readonly Game[] = []) {
    this.games = Object.freeze([...games]);
    this.byKey = new Map(this.games.map((game): [string, Game] => [gameKey(game), game]));

    const owners = new Map<string, Set<string>>();
    for (const game of this.games) {
      const repositories = owners.get(game.name) ?? new Set<string>();
      repositories.add(game.repositoryName);
      owners.set(game.name, repositories);
    }
    this.colliding = new Set([...owners].filter(([, repos]) => repos.size > 1).map(([name]) => name));
  }

  public static empty(): Catalog {
    return new Catalog();
  }

  get size(): number {
    return this.games.length;
  }

  public isEmpty(): boolean {
    return this.games.length === 0;
  }

  public sort(by: GameSortOrder = 'publishedAtDesc'): Game[] {
    return sortGames(this.games, by);
  }

  public filter(filter: GameFilter): Game[] {
    return filterGames(this.games, filter);
  }

  public languages(): string[] {
    return findLanguages(this.games);
  }

  public findGame(repositoryName: string, name: string): Game | undefined {
    return this.byKey.get(gameKey({ repositoryName, name }));
  }

  /**
   * Names published by more than one repository
   */
  public collidingNames(): ReadonlySet<string> {
    return this.colliding;
  }
}
