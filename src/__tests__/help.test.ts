import { describe, it, expect } from 'vitest';
import { OPTION_HELP } from '../cli/help.js';
import { EXAMPLES } from '../cli/examples.js';

describe('OPTION_HELP', () => {
  it('says an unset bucket is prompted for', () => {
    expect(OPTION_HELP.bucket).toContain('With no bucket set, {bucket} is prompted for');
  });

  it('points --eval-df users at select instead of indexing', () => {
    expect(OPTION_HELP.evalDf).toContain("Pick columns with df.select('a', 'b'); df[['a']] is not supported.");
  });

  it('documents the keyword literals --kwargs accepts', () => {
    expect(OPTION_HELP.kwargs).toContain('True/False/None are accepted; None binds as NULL');
  });
});

describe('EXAMPLES', () => {
  it('shows column selection with select', () => {
    const commands = EXAMPLES.flatMap((example) => example.commands);

    expect(commands).toContain(`gsq --query-file /tmp/query.sql --eval-df "df.select('hour', 'bidfloor')"`);
  });
});
