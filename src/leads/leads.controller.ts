import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import type { BatchSummary } from '../reconciliation/reconciliation.types';
import { Lead } from './lead.entity';
import { LeadsService } from './leads.service';
import { CreateLeadDto } from './dto/create-lead.dto';
import { IngestDiscoveriesDto } from './dto/ingest-discoveries.dto';
import { QueryLeadsDto } from './dto/query-leads.dto';
import { UpdateLeadStatusDto } from './dto/update-lead-status.dto';

@Controller('leads')
export class LeadsController {
  constructor(private readonly leadsService: LeadsService) {}

  @Post()
  create(@Body() createLeadDto: CreateLeadDto): Promise<Lead> {
    return this.leadsService.create(createLeadDto);
  }

  @Post('discoveries')
  @HttpCode(HttpStatus.OK)
  ingestDiscoveries(@Body() body: IngestDiscoveriesDto): Promise<BatchSummary> {
    return this.leadsService.ingestDiscoveries(body.records);
  }

  @Get()
  findAll(@Query() query: QueryLeadsDto): Promise<Lead[]> {
    return this.leadsService.findAll(query);
  }

  @Get(':id')
  findOne(@Param('id', ParseIntPipe) id: number): Promise<Lead> {
    return this.leadsService.findOne(id);
  }

  @Patch(':id/status')
  updateStatus(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateLeadStatusDto,
  ): Promise<Lead> {
    return this.leadsService.updateStatus(id, body.status);
  }
}
