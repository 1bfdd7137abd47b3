import { readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Min,
  ValidateNested,
  validateSync,
  ValidationError,
} from 'class-validator';
import { ColumnFormat, StatementConfig } from './statement-config.interface';

const COLUMN_FORMATS: ColumnFormat[] = ['date', 'amount', 'percent', 'rate', 'text'];

// Process environment, as read after dotenv has run.
export class StatementEnvironment {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  STATEMENTS_PRIMARY_PATH?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  STATEMENTS_SECONDARY_PATH?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  STATEMENTS_TRADE_BOOK_FILE?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  STATEMENTS_TEMPLATE_FILE?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  STATEMENTS_OUTPUT_DIR?: string;

  @IsOptional()
  @Matches(/\{date\}/, { message: 'STATEMENTS_FEED_PATTERN must contain {date}' })
  STATEMENTS_FEED_PATTERN?: string;

  @IsOptional()
  @IsString()
  STATEMENTS_FEED_LABEL?: string;

  @IsOptional()
  @IsString()
  STATEMENTS_PRODUCT_LABEL?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  STATEMENTS_MAPPINGS_FILE?: string;
}

class TemplateLayoutFile {
  @IsInt()
  @Min(1)
  headerRow!: number;

  @Matches(/^[A-Z]+[1-9]\d*$/)
  titleCell!: string;

  @Matches(/^[A-Z]+[1-9]\d*$/)
  dateCell!: string;
}

// Shape of the JSON mappings file.
export class StatementMappingsFile {
  @ValidateNested()
  @Type(() => TemplateLayoutFile)
  template!: TemplateLayoutFile;

  @IsObject()
  headerMapping!: Record<string, string>;

  @IsOptional()
  @IsObject()
  defaultFieldValues?: Record<string, string>;

  @IsOptional()
  @IsObject()
  columnFormats?: Record<string, string>;
}

export class ConfigValidationError extends Error {
  constructor(
    readonly source: string,
    readonly problems: string[],
  ) {
    super(`Invalid configuration in ${source}: ${problems.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const property = prefix ? `${prefix}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

function validated<T extends object>(cls: new () => T, plain: unknown, source: string): T {
  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance);
  if (errors.length > 0) {
    throw new ConfigValidationError(source, flattenErrors(errors));
  }
  return instance;
}

function isColumnFormat(value: string): value is ColumnFormat {
  return COLUMN_FORMATS.some((format) => format === value);
}

function toStringRecord(value: Record<string, unknown> | undefined, source: string, field: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value ?? {})) {
    if (typeof entry !== 'string' && typeof entry !== 'number') {
      throw new ConfigValidationError(source, [`${field}.${key}: must be a string`]);
    }
    result[key] = String(entry);
  }
  return result;
}

function toColumnFormats(value: Record<string, string> | undefined, source: string): Record<string, ColumnFormat> {
  const result: Record<string, ColumnFormat> = {};
  for (const [field, format] of Object.entries(value ?? {})) {
    if (!isColumnFormat(format)) {
      throw new ConfigValidationError(source, [`columnFormats.${field}: must be one of ${COLUMN_FORMATS.join(', ')}`]);
    }
    result[field] = format;
  }
  return result;
}

export function readMappingsFile(path: string): StatementMappingsFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigValidationError(path, [error instanceof Error ? error.message : String(error)]);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigValidationError(path, ['expected a JSON object']);
  }
  return validated(StatementMappingsFile, parsed, path);
}

/**
 * Builds the pipeline configuration from environment variables plus the
 * JSON mappings file. Relative paths resolve against `cwd`.
 *
 * @throws ConfigValidationError listing every invalid setting
 */
export function loadStatementConfig(
  env: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): StatementConfig {
  const settings = validated(StatementEnvironment, env, 'environment');
  const fromCwd = (path: string) => (isAbsolute(path) ? path : resolve(cwd, path));

  const primaryPath = fromCwd(settings.STATEMENTS_PRIMARY_PATH ?? './data');
  const mappingsPath = fromCwd(settings.STATEMENTS_MAPPINGS_FILE ?? './config/statement-mappings.json');
  const mappings = readMappingsFile(mappingsPath);

  return {
    primaryPath,
    secondaryPath: fromCwd(settings.STATEMENTS_SECONDARY_PATH ?? './data/archive'),
    tradeBookFile: settings.STATEMENTS_TRADE_BOOK_FILE ?? 'trade-book.xlsx',
    templateFile: fromCwd(settings.STATEMENTS_TEMPLATE_FILE ?? './data/statement-template.xlsx'),
    outputDir: fromCwd(settings.STATEMENTS_OUTPUT_DIR ?? './data/statements'),
    feedFilePattern: settings.STATEMENTS_FEED_PATTERN ?? 'valuations_{date}.csv',
    feedLabel: settings.STATEMENTS_FEED_LABEL ?? 'Daily Valuation',
    productLabel: settings.STATEMENTS_PRODUCT_LABEL ?? 'Interest Rate Swaps',
    headerMapping: toStringRecord(mappings.headerMapping, mappingsPath, 'headerMapping'),
    defaultFieldValues: toStringRecord(mappings.defaultFieldValues, mappingsPath, 'defaultFieldValues'),
    columnFormats: toColumnFormats(mappings.columnFormats, mappingsPath),
    template: {
      headerRow: mappings.template.headerRow,
      titleCell: mappings.template.titleCell,
      dateCell: mappings.template.dateCell,
    },
  };
}
