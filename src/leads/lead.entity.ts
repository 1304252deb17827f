import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { LeadSource, LeadStatus, QualificationLevel } from './lead.enums';

@Entity('leads')
@Index('UQ_leads_source_external_id', ['source', 'externalId'], {
  unique: true,
})
// Placeholder emails (unknown@<domain>) may repeat; live emails may not.
@Index('UQ_leads_live_email', ['email'], {
  unique: true,
  where: `"email" NOT LIKE 'unknown@%'`,
})
@Index('IDX_leads_created_at', ['createdAt'])
export class Lead {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({ type: 'varchar', length: 50 })
  source!: LeadSource;

  @Column({ type: 'varchar', length: 255, nullable: true })
  externalId!: string | null;

  @Column({ type: 'varchar', length: 255 })
  displayName!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  domain!: string | null;

  @Column({ type: 'simple-json' })
  candidateDomains!: string[];

  @Column({ type: 'varchar', length: 50, nullable: true })
  niche!: string | null;

  @Column({ type: 'double precision', nullable: true })
  nicheConfidence!: number | null;

  @Column({ type: 'varchar', length: 50, default: LeadStatus.NEW })
  status!: LeadStatus;

  @Column({ type: 'varchar', length: 50, default: QualificationLevel.COLD })
  qualificationLevel!: QualificationLevel;

  @Column({ type: 'int', default: 0 })
  leadScore!: number;

  @Column({ type: 'int', nullable: true })
  emailConfidence!: number | null;

  @Column({ type: Boolean, default: false })
  emailVerified!: boolean;

  @Column({ type: 'int', default: 0 })
  enrichmentAttempts!: number;

  @Column({ type: Date, nullable: true })
  enrichedAt!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
