import chalk from "chalk";
import type { ArtifactKind } from "../types";
import type { PublishOutcome } from "../pipeline";

const duration = (ms: number): string => {
  if (ms < 0) return '0s';

  const seconds = Math.floor((ms / 1000) % 60);
  const minutes = Math.floor((ms / (1000 * 60)) % 60);
  const hours = Math.floor((ms / (1000 * 60 * 60)));

  const parts = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);

  return parts.join(' ');
}

export const fmt = {
  artifactKind: (k: ArtifactKind) => {
    switch(k) {
      case 'low-quality': return 'Low quality';
      case 'preview': return 'Preview';
    }
  },

  present: (present: boolean): string => present ? chalk.green('yes') : chalk.red('missing'),

  publishOutcome: (o: PublishOutcome | 'failed'): string => {
    switch(o) {
      case 'published': return chalk.green('published');
      case 'skipped': return chalk.gray('nothing to publish');
      case 'failed': return chalk.red('publish failed');
    }
  },

  count: (n: number, noun: string) => `${n} ${noun}${n === 1 ? '' : 's'}`,

  duration,
}
