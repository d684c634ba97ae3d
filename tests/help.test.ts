import chalk from 'chalk';
import { beforeAll, describe, expect, it } from 'vitest';

import { helpTopics, renderHelp } from '../src/help';

describe('renderHelp', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('lists the topics when none is given', () => {
    expect(renderHelp(undefined, 'artifact-migrate')).toEqual([
      'artifact-migrate Help',
      '─'.repeat(50),
      'Available help topics:',
      '  config      Configuration File Format',
      '  strategies  Scale Strategies',
      '  resume      Pausing and Resuming',
      '  errors      Failures and Retries',
      '',
      'Use: artifact-migrate help <topic> for detailed information',
    ]);
  });

  it('ends a topic with its examples', () => {
    const lines = renderHelp('resume', 'artifact-migrate');

    expect(lines[0]).toBe('Pausing and Resuming');
    expect(lines[2]).toBe(helpTopics.resume.content.trimEnd());
    expect(lines.slice(3)).toEqual([
      '',
      'Examples:',
      '  $ artifact-migrate ./migration.yaml --resume <runId>',
      '  $ artifact-migrate ./migration.yaml --prior-run <runId>',
      '  $ artifact-migrate status ./migration.yaml <runId>',
    ]);
  });

  it('points at the index for an unknown topic', () => {
    const lines = renderHelp('toString', 'artifact-migrate');

    expect(lines.slice(0, 3)).toEqual(['Unknown help topic: toString', '', 'artifact-migrate Help']);
  });
});
