import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { TradeBookStorageService } from './trade-book-storage.service';
import { SourceNotFoundError } from '../common/errors/statement.errors';
import { STATEMENT_CONFIG, StatementConfig } from '../config/statement-config.interface';
import { buildTestConfig, makeTempDir, removeTempDir } from '../testing/fixtures';

describe('TradeBookStorageService', () => {
  let storage: TradeBookStorageService;
  let config: StatementConfig;
  let dir: string;

  const bookCsv = [
    'TRADEIDENTIFIER,TRADE DATE,P&L,SPREAD,FUND ID,CURRENCY',
    'ABC1234,2024-01-01,1200,30,FUND-A,EUR',
    '0001234,2024-02-01,"1,500.25",,FUND-B,USD',
  ].join('\n');

  const createStorage = async (overrides: Partial<StatementConfig> = {}) => {
    config = buildTestConfig(dir, overrides);
    const module: TestingModule = await Test.createTestingModule({
      providers: [TradeBookStorageService, { provide: STATEMENT_CONFIG, useValue: config }],
    }).compile();
    return module.get<TradeBookStorageService>(TradeBookStorageService);
  };

  beforeEach(async () => {
    dir = await makeTempDir();
    storage = await createStorage();
    await mkdir(config.primaryPath, { recursive: true });
    await writeFile(storage.path, bookCsv);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('load', () => {
    it('should read every row keeping identifiers as text', async () => {
      const table = await storage.load();

      expect(table.columns).toEqual(['TRADEIDENTIFIER', 'TRADE DATE', 'P&L', 'SPREAD', 'FUND ID', 'CURRENCY']);
      expect(table.rows).toHaveLength(2);
      expect(table.rows[1]).toEqual({
        TRADEIDENTIFIER: '0001234',
        'TRADE DATE': '2024-02-01',
        'P&L': '1,500.25',
        SPREAD: null,
        'FUND ID': 'FUND-B',
        CURRENCY: 'USD',
      });
    });

    it('should fail when the trade book file is missing', async () => {
      const missing = await createStorage({ tradeBookFile: 'nope.csv' });

      await expect(missing.load()).rejects.toThrow(SourceNotFoundError);
    });
  });

  describe('getTable', () => {
    it('should load lazily and return a copy', async () => {
      const first = await storage.getTable();
      first.rows[0].TRADEIDENTIFIER = 'CHANGED';
      first.columns.push('EXTRA');

      const second = await storage.getTable();

      expect(second.rows[0].TRADEIDENTIFIER).toBe('ABC1234');
      expect(second.columns).not.toContain('EXTRA');
    });
  });

  describe('append', () => {
    it('should fill blank columns from the default values', async () => {
      const index = await storage.append({ TRADEIDENTIFIER: 'NEW0001', 'FUND ID': 'FUND-C', CURRENCY: '' });

      const table = await storage.getTable();
      expect(index).toBe(2);
      expect(table.rows[2]).toEqual({ TRADEIDENTIFIER: 'NEW0001', 'FUND ID': 'FUND-C', CURRENCY: 'USD' });
    });

    it('should keep values that are present', async () => {
      await storage.append({ TRADEIDENTIFIER: 'NEW0002', CURRENCY: 'GBP' });

      const table = await storage.getTable();
      expect(table.rows[2].CURRENCY).toBe('GBP');
    });

    it('should add unseen columns to the book', async () => {
      await storage.append({ TRADEIDENTIFIER: 'NEW0003', 'PAY RATE': '4.25' });

      const table = await storage.getTable();
      expect(table.columns[table.columns.length - 1]).toBe('PAY RATE');
    });
  });

  describe('replace', () => {
    it('should replace a single row', async () => {
      await storage.replace(0, { TRADEIDENTIFIER: 'ABC1234', 'P&L': '900', 'FUND ID': 'FUND-A' });

      const table = await storage.getTable();
      expect(table.rows[0]).toEqual({ TRADEIDENTIFIER: 'ABC1234', 'P&L': '900', 'FUND ID': 'FUND-A' });
      expect(table.rows[1].TRADEIDENTIFIER).toBe('0001234');
    });

    it('should throw for an index outside the book', async () => {
      await expect(storage.replace(5, { TRADEIDENTIFIER: 'X' })).rejects.toThrow(NotFoundException);
      await expect(storage.replace(-1, { TRADEIDENTIFIER: 'X' })).rejects.toThrow(NotFoundException);
    });
  });

  describe('save', () => {
    it('should rewrite the whole file with edits', async () => {
      await storage.append({ TRADEIDENTIFIER: 'NEW0001', 'FUND ID': 'FUND-C' });

      const rowCount = await storage.save();

      expect(rowCount).toBe(3);
      const reread = await (await createStorage()).load();
      expect(reread.rows).toHaveLength(3);
      expect(reread.rows[2].TRADEIDENTIFIER).toBe('NEW0001');
      expect(reread.rows[2].CURRENCY).toBe('USD');
      expect(reread.rows[1].TRADEIDENTIFIER).toBe('0001234');
    });

    it('should write dates as ISO text in CSV books', async () => {
      await storage.replace(0, { TRADEIDENTIFIER: 'ABC1234', 'TRADE DATE': new Date(2024, 2, 15) });

      await storage.save();

      const content = await readFile(storage.path, 'utf8');
      expect(content.split('\n')[1]).toMatch(/^ABC1234,2024-03-15,*$/);
    });
  });

  describe('reload', () => {
    it('should discard unsaved edits', async () => {
      await storage.append({ TRADEIDENTIFIER: 'NEW0001' });

      const table = await storage.reload();

      expect(table.rows).toHaveLength(2);
    });
  });
});
