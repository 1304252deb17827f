import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { reconciliationMetricsProviders } from '../common/metrics.providers';
import {
  LEAD_ENGINE_CONFIG,
  leadEngineConfigProvider,
} from '../config/lead-engine.config';
import { Lead } from '../leads/lead.entity';
import { DomainPredictor } from './domain-predictor';
import { LeadReconciler } from './lead-reconciler.service';
import { LeadScorer } from './lead-scoring';
import { NicheClassifier } from './niche-classifier';
import { ProvenancePolicy } from './provenance.policy';

@Module({
  imports: [ConfigModule, TypeOrmModule.forFeature([Lead])],
  providers: [
    leadEngineConfigProvider,
    DomainPredictor,
    NicheClassifier,
    ProvenancePolicy,
    LeadScorer,
    LeadReconciler,
    ...reconciliationMetricsProviders,
  ],
  exports: [
    LEAD_ENGINE_CONFIG,
    DomainPredictor,
    NicheClassifier,
    ProvenancePolicy,
    LeadScorer,
    LeadReconciler,
  ],
})
export class ReconciliationModule {}
