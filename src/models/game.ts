/**
 * Game record from a repository index
 */
export interface Game {
  /** Stable machine id, unique within its repository */
  name: string;
  /** Human readable title */
  title: string;
  description: string;
  version: string;
  /** Language codes in the order the index lists them */
  languages: string[];
  /** Name of the repository the record came from */
  repositoryName: string;
  /** Page with more information about the game */
  descriptionUrl: string;
  /** Location of the game archive */
  downloadUrl: string;
  /** Declared archive size */
  sizeBytes: number;
  publishedAt: Date;
  /** Optional icon reference, empty when the index has none */
  imageUrl: string;
  /**
   * Whether the install directory exists. Derived from the filesystem,
   * refreshed by GameLayout before listings.
   */
  installed: boolean;
}

/**
 * Keys a game by the identity the catalog uses
 */
export const gameKey = (game: Pick<Game, 'repositoryName' | 'name'>): string =>
  `${game.repositoryName}/${game.name}`;

/**
 * Callback receiving the cumulative number of downloaded bytes
 */
export type ProgressCallback = (bytesTransferred: number) => void;

export type GameSortOrder = 'title' | 'publishedAtDesc';

/**
 * Criteria for catalog filtering, all optional and combined with AND
 */
export interface GameFilter {
  keyword?: string;
  repositoryName?: string;
  language?: string;
  onlyInstalled?: boolean;
}
