import { IsDateString } from 'class-validator';

export class RunStatementsDto {
  @IsDateString({ strict: true })
  asOfDate!: string;          // yyyy-MM-dd
}

export class PreviewStatementsQueryDto {
  @IsDateString({ strict: true })
  asOfDate!: string;
}
