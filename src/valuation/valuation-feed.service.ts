import { Inject, Injectable, Logger } from '@nestjs/common';
import { copyFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { TabularData } from '../common/interfaces/tabular.interface';
import { SourceNotFoundError } from '../common/errors/statement.errors';
import { compactDate } from '../common/utils/date.util';
import { fileExists, readTable } from '../common/utils/tabular.util';
import { STATEMENT_CONFIG, StatementConfig } from '../config/statement-config.interface';

/**
 * Finds the valuation feed for an as-of date.
 * The working copy lives under the primary path; when it is not there yet
 * it is copied over from the secondary path first.
 */
@Injectable()
export class ValuationFeedService {
  private readonly logger = new Logger(ValuationFeedService.name);

  constructor(@Inject(STATEMENT_CONFIG) private readonly config: StatementConfig) {}

  feedFileName(asOfDate: Date): string {
    return this.config.feedFilePattern.replace('{date}', compactDate(asOfDate));
  }

  /** @throws SourceNotFoundError when neither location holds the feed */
  async locate(asOfDate: Date): Promise<string> {
    const fileName = this.feedFileName(asOfDate);
    const primary = join(this.config.primaryPath, fileName);
    if (await fileExists(primary)) {
      return primary;
    }

    const secondary = join(this.config.secondaryPath, fileName);
    if (!(await fileExists(secondary))) {
      throw new SourceNotFoundError('valuation feed', [primary, secondary]);
    }

    await mkdir(this.config.primaryPath, { recursive: true });
    await copyFile(secondary, primary);
    this.logger.warn(`Valuation feed ${fileName} copied from ${this.config.secondaryPath}`);
    return primary;
  }

  async load(asOfDate: Date): Promise<TabularData> {
    const path = await this.locate(asOfDate);
    const feed = await readTable('valuation feed', path);
    this.logger.log(`Loaded ${feed.rows.length} valuation(s) from ${path}`);
    return feed;
  }
}
