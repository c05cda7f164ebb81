import { resolveTargetPath, type MiningSummary } from "@commitscope/core";
import {
  mineRepositoryHistoryFromGit,
  type GitHistoryProgressEvent,
  type MiningProgressEvent,
} from "@commitscope/history-miner";
import { formatCommitDate } from "@commitscope/report-context";
import { createSilentLogger, type Logger } from "./logger.js";

export type MineCommandOptions = {
  daysBack: number;
  branch?: string;
  contributors: readonly string[];
};

const logHistoryEvent = (logger: Logger, event: GitHistoryProgressEvent): void => {
  switch (event.stage) {
    case "git_log_received":
      logger.debug(`history: git log loaded for ${event.ref} (${event.bytes} bytes)`);
      break;
    case "git_log_parsed":
      logger.debug(`history: parsed ${event.commits} commits on ${event.ref}`);
      break;
    case "diff_failed":
      logger.warn(`history: could not read diff of ${event.commitId}: ${event.message}`);
      break;
  }
};

export const createMiningProgressReporter = (
  logger: Logger,
): ((event: MiningProgressEvent) => void) => {
  let lastLoggedCommit = 0;

  return (event) => {
    switch (event.stage) {
      case "checking_git_repository":
        logger.debug("history: checking git repository");
        break;
      case "not_git_repository":
        logger.warn("history: target path is not a git repository");
        break;
      case "resolving_commits":
        logger.debug(
          event.sinceUnix === null
            ? `history: listing commits on ${event.ref}`
            : `history: listing commits on ${event.ref} since ${formatCommitDate(event.sinceUnix)}`,
        );
        break;
      case "ref_not_found":
        if (event.explicit) {
          logger.warn(`history: branch '${event.ref}' not found`);
        } else {
          logger.debug(`history: ref '${event.ref}' not found`);
        }
        break;
      case "no_commits_in_range":
        if (event.explicit) {
          logger.warn(`history: no commits found on '${event.ref}' for the selected period`);
        } else {
          logger.info(`history: no commits on '${event.ref}' in the selected period`);
        }
        break;
      case "commits_resolved":
        logger.info(
          `history: ${event.total} commits on ${event.ref}${event.windowApplied ? "" : " (full history)"}`,
        );
        break;
      case "commit_processed": {
        if (
          event.processed === event.total ||
          event.processed === 1 ||
          event.processed - lastLoggedCommit >= 100
        ) {
          lastLoggedCommit = event.processed;
          const currentPercent = event.total === 0 ? 100 : Math.floor((event.processed / event.total) * 100);
          logger.info(`history: analyzed ${event.processed}/${event.total} commits (${currentPercent}%)`);
          logger.debug(`history: last commit analyzed ${event.hash}`);
        }
        break;
      }
      case "diff_unavailable":
        logger.warn(`history: diff unavailable for ${event.hash}: ${event.message}`);
        break;
      case "structure_unreadable":
        logger.warn(`structure: could not read ${event.path}: ${event.message}`);
        break;
      case "mining_completed":
        logger.info(`history: mined ${event.commits} commits from ${event.contributors} contributors`);
        break;
      case "history":
        logHistoryEvent(logger, event.event);
        break;
    }
  };
};

export const runMineCommand = (
  inputPath: string | undefined,
  options: MineCommandOptions,
  logger: Logger = createSilentLogger(),
): MiningSummary => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const target = resolveTargetPath(inputPath, invocationCwd);
  logger.info(`mining repository: ${target.absolutePath}`);

  const summary = mineRepositoryHistoryFromGit(
    {
      repositoryPath: target.absolutePath,
      daysBack: options.daysBack,
      ...(options.branch === undefined ? {} : { branch: options.branch }),
      ...(options.contributors.length === 0 ? {} : { contributorFilter: options.contributors }),
    },
    createMiningProgressReporter(logger),
  );

  if (!summary.available) {
    logger.error(`could not analyze repository: ${summary.targetPath} is not a git repository`);
  }

  return summary;
};
