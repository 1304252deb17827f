import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
} from 'typeorm';

export enum EnrichmentCallStatus {
  FOUND = 'found',
  EMPTY = 'empty',
  FAILED = 'failed',
}

/**
 * Enrichment Log Entity
 * One row per external email finder call, read back by the stats and
 * history endpoints. Ad-hoc domain lookups carry no lead.
 */
@Entity('enrichment_logs')
@Index(['timestamp'])
@Index(['runId'])
export class EnrichmentLog {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 36 })
  runId!: string;

  @Column({ type: 'int', nullable: true })
  leadId!: number | null;

  @Column({ type: 'varchar', length: 255 })
  domain!: string;

  @Column({ type: 'varchar', length: 50 })
  provider!: string;

  @Column({ type: 'varchar', length: 20 })
  status!: EnrichmentCallStatus;

  @Column({ type: 'int', default: 0 })
  emailsFound!: number;

  @Column({ type: Boolean, default: false })
  applied!: boolean;

  @Column({ type: 'int' })
  durationMs!: number;

  @Column({ type: 'varchar', length: 500, nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn()
  timestamp!: Date;
}
