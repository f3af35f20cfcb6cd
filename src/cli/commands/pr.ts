import type { Command } from 'commander';
import { getContext, type AppContext } from '../context.js';
import { errColors, isJsonOutput, printError, printInfo, printJson, printWarning, writeOut } from '../output.js';
import { currentBranch, lastCommitMessage, pushBranch } from '../../git/branch.js';
import { listRemotes, trackingRemote } from '../../git/remotes.js';
import { uncommittedChangeCount } from '../../git/status.js';
import { fullName } from '../../github/ghrepo.js';
import { fetchRepoNetwork, repoRef } from '../../github/repo.js';
import { createPullRequest } from '../../github/pr.js';
import { resolvePrTarget } from '../../resolve/target.js';
import { compareUrl, displayUrl, openInBrowser } from '../../browser/open.js';
import { errorMessage, pluralize } from '../../utils/text.js';

export interface PrCreateOptions {
  title?: string;
  body?: string;
  base?: string;
  draft?: boolean;
  fill?: boolean;
  web?: boolean;
  remote?: string;
}

/** Title and body from flags, topped up from the last commit under --fill. */
async function pullRequestText(
  options: PrCreateOptions,
  cwd: string,
): Promise<{ title: string; body: string }> {
  let title = options.title;
  let body = options.body;

  if (options.fill && (!title || body === undefined)) {
    const commit = await lastCommitMessage(cwd);
    title = title || commit.subject;
    body = body ?? commit.body;
  }

  if (!title) {
    throw new Error('A title is required: pass --title, or --fill to use the last commit');
  }
  return { title, body: body ?? '' };
}

export async function createPr(ctx: AppContext, options: PrCreateOptions): Promise<void> {
  const { cwd, config } = ctx;

  // Uncommitted work is worth mentioning but never blocks the pull request
  const changes = await uncommittedChangeCount(cwd);
  if (changes > 0) {
    printWarning(pluralize(changes, 'uncommitted change'));
  }

  const branch = await currentBranch(cwd);
  const remotes = await listRemotes(config.github.host, cwd);
  const tracking = await trackingRemote(branch, cwd);
  const client = ctx.github();

  const target = await resolvePrTarget(
    {
      branch,
      remotes,
      trackingRemote: tracking,
      baseBranch: options.base,
      defaultRemote: options.remote ?? config.remotes.default,
      priority: config.remotes.priority,
    },
    lookups => fetchRepoNetwork(client, lookups),
  );
  const baseName = fullName(repoRef(target.baseRepo));

  if (options.web) {
    await pushBranch(target.headRemote.name, branch, cwd);
    const url = compareUrl(config.github.host, repoRef(target.baseRepo), target.baseRefName, target.headRefName);
    printInfo(`Opening ${displayUrl(url)} in your browser.`);
    await openInBrowser(url, config.browser);
    return;
  }

  const { title, body } = await pullRequestText(options, cwd);

  const colors = errColors();
  printInfo(
    `\nCreating pull request for ${colors.cyan(branch)} into ${colors.cyan(target.baseRefName)} in ${baseName}\n`,
  );

  await pushBranch(target.headRemote.name, branch, cwd);

  const pr = await createPullRequest(client, {
    repositoryId: target.baseRepositoryID,
    title,
    body,
    baseRefName: target.baseRefName,
    headRefName: target.headRefName,
    draft: options.draft ?? false,
  });

  if (isJsonOutput()) {
    printJson({
      url: pr.url,
      number: pr.number,
      baseRefName: target.baseRefName,
      headRefName: target.headRefName,
    });
  } else {
    writeOut(pr.url + '\n');
  }
}

export function registerPrCommands(program: Command): void {
  const pr = program
    .command('pr')
    .description('Work with GitHub pull requests');

  pr
    .command('create')
    .description('Create a pull request for the current branch')
    .option('-t, --title <title>', 'pull request title')
    .option('-b, --body <body>', 'pull request body')
    .option('-B, --base <branch>', 'branch to merge into (default: the base repository\'s default branch)')
    .option('-d, --draft', 'open as a draft pull request')
    .option('-f, --fill', 'use the last commit for any missing title or body')
    .option('-w, --web', 'open the compare page in the browser instead')
    .option('-R, --remote <name>', 'remote whose repository receives the pull request')
    .action(async (options: PrCreateOptions) => {
      try {
        const ctx = await getContext();
        await createPr(ctx, options);
      } catch (err) {
        printError(errorMessage(err));
        process.exitCode = 1;
      }
    });
}
