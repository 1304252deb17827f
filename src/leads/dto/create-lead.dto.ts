import { IsEmail, IsIn, IsOptional, IsString, MaxLength } from 'class-validator';
import { LeadSource } from '../lead.enums';

export const DIRECT_SOURCES = [
  LeadSource.MANUAL,
  LeadSource.DEMO_CHAT,
  LeadSource.API,
] as const;

export type DirectSource = (typeof DIRECT_SOURCES)[number];

export class CreateLeadDto {
  @IsEmail()
  @MaxLength(255)
  email!: string;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  name?: string;

  @IsIn(DIRECT_SOURCES)
  @IsOptional()
  source?: DirectSource;

  @IsString()
  @IsOptional()
  @MaxLength(255)
  domain?: string;
}
