import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { ConfigValidationError, loadStatementConfig } from './statement-config.loader';
import { makeTempDir, removeTempDir } from '../testing/fixtures';

describe('loadStatementConfig', () => {
  let dir: string;

  const mappings = {
    template: { headerRow: 5, titleCell: 'A1', dateCell: 'B2' },
    headerMapping: { 'Trade ID': 'TRADEIDENTIFIER', Bid: 'BID' },
    defaultFieldValues: { CURRENCY: 'USD', SPREAD: 0 },
    columnFormats: { BID: 'percent', 'TRADE DATE': 'date' },
  };

  const writeMappings = async (content: unknown, name = 'statement-mappings.json') => {
    await writeFile(join(dir, 'config', name), JSON.stringify(content));
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    await mkdir(join(dir, 'config'));
    await writeMappings(mappings);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should build the config with defaults resolved against cwd', () => {
    const config = loadStatementConfig({}, dir);

    expect(config).toEqual({
      primaryPath: join(dir, 'data'),
      secondaryPath: join(dir, 'data', 'archive'),
      tradeBookFile: 'trade-book.xlsx',
      templateFile: join(dir, 'data', 'statement-template.xlsx'),
      outputDir: join(dir, 'data', 'statements'),
      feedFilePattern: 'valuations_{date}.csv',
      feedLabel: 'Daily Valuation',
      productLabel: 'Interest Rate Swaps',
      headerMapping: { 'Trade ID': 'TRADEIDENTIFIER', Bid: 'BID' },
      defaultFieldValues: { CURRENCY: 'USD', SPREAD: '0' },
      columnFormats: { BID: 'percent', 'TRADE DATE': 'date' },
      template: { headerRow: 5, titleCell: 'A1', dateCell: 'B2' },
    });
  });

  it('should take paths and labels from the environment', () => {
    const config = loadStatementConfig(
      {
        STATEMENTS_PRIMARY_PATH: '/srv/book',
        STATEMENTS_SECONDARY_PATH: 'shared',
        STATEMENTS_FEED_PATTERN: 'pv_{date}.xlsx',
        STATEMENTS_FEED_LABEL: 'EOD Marks',
      },
      dir,
    );

    expect(config.primaryPath).toBe('/srv/book');
    expect(config.secondaryPath).toBe(join(dir, 'shared'));
    expect(config.feedFilePattern).toBe('pv_{date}.xlsx');
    expect(config.feedLabel).toBe('EOD Marks');
  });

  it('should reject a feed pattern without a date placeholder', () => {
    expect(() => loadStatementConfig({ STATEMENTS_FEED_PATTERN: 'valuations.csv' }, dir)).toThrow(
      'Invalid configuration in environment: STATEMENTS_FEED_PATTERN: STATEMENTS_FEED_PATTERN must contain {date}',
    );
  });

  it('should reject an unknown column format', async () => {
    await writeMappings({ ...mappings, columnFormats: { BID: 'fraction' } });

    expect(() => loadStatementConfig({}, dir)).toThrow(ConfigValidationError);
  });

  it('should reject an invalid template layout', async () => {
    await writeMappings({ ...mappings, template: { headerRow: 0, titleCell: 'A1', dateCell: 'A2' } });

    expect(() => loadStatementConfig({}, dir)).toThrow(/template\.headerRow/);
  });

  it('should reject a mappings file that is not JSON', async () => {
    await writeFile(join(dir, 'config', 'statement-mappings.json'), '{ not json');

    expect(() => loadStatementConfig({}, dir)).toThrow(ConfigValidationError);
  });

  it('should read the mappings file named in the environment', async () => {
    await writeMappings({ ...mappings, headerMapping: { Offer: 'OFFER' } }, 'other.json');

    const config = loadStatementConfig({ STATEMENTS_MAPPINGS_FILE: 'config/other.json' }, dir);

    expect(config.headerMapping).toEqual({ Offer: 'OFFER' });
  });
});
