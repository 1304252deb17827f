import { IsEnum } from 'class-validator';
import { LeadStatus } from '../lead.enums';

export class UpdateLeadStatusDto {
  @IsEnum(LeadStatus)
  status!: LeadStatus;
}
