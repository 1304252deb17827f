import { ArrayMaxSize, IsArray } from 'class-validator';

/**
 * Envelope only. Each record is validated by the reconciler so that one
 * malformed record is skipped instead of failing the whole batch.
 */
export class IngestDiscoveriesDto {
  @IsArray()
  @ArrayMaxSize(500)
  records!: unknown[];
}
