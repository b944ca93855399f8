/**
 * GitHub module sources.
 *
 * `github::<user>/<repo>` is cloned into `<modules_directory>/<user>/<repo>`
 * on first use and pulled when the enabling statement sets `autoupdate`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { simpleGit } from 'simple-git';
import type { Logger } from 'pino';
import { ModuleSourceError, toError } from '../errors.js';

export interface GithubRepository {
  user: string;
  repo: string;
}

export interface RepositoryFetcher {
  /** Ensure `destination` holds a checkout of `repository` */
  fetch(repository: GithubRepository, destination: string, options: { update: boolean }): Promise<void>;
}

const REPOSITORY_PATTERN = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/;

export function parseGithubRepository(value: string): GithubRepository | null {
  const match = REPOSITORY_PATTERN.exec(value);
  if (!match?.[1] || !match[2]) return null;
  return { user: match[1], repo: match[2] };
}

export function repositoryUrl(repository: GithubRepository): string {
  return `https://github.com/${repository.user}/${repository.repo}.git`;
}

export class GitRepositoryFetcher implements RepositoryFetcher {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'repository-fetcher' });
  }

  async fetch(repository: GithubRepository, destination: string, options: { update: boolean }): Promise<void> {
    const url = repositoryUrl(repository);
    const exists = fs.existsSync(path.join(destination, '.git'));

    try {
      if (!exists) {
        fs.mkdirSync(path.dirname(destination), { recursive: true });
        this.logger.info({ url, destination }, `Cloning ${url}`);
        await simpleGit().clone(url, destination, ['--depth', '1']);
      } else if (options.update) {
        this.logger.info({ destination }, `Updating ${repository.user}/${repository.repo}`);
        await simpleGit(destination).pull();
      }
    } catch (err) {
      throw new ModuleSourceError(`Could not fetch ${url}: ${toError(err).message}`);
    }
  }
}
