import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MatchResult } from './entities/match-result.entity';
import { ResultService } from './result.service';
import { SettlementService } from './settlement.service';
import { ResultSweepService } from './result-sweep.service';
import { ResultController } from './result.controller';
import { MatchModule } from '../match/match.module';
import { PredictionModule } from '../prediction/prediction.module';
import { LeaderboardModule } from '../leaderboard/leaderboard.module';
import { AuditModule } from '../audit/audit.module';
import { NotificationModule } from '../notification/notification.module';
import { CommonModule } from '../common/common.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([MatchResult]),
    MatchModule,
    PredictionModule,
    LeaderboardModule,
    AuditModule,
    NotificationModule,
    CommonModule,
  ],
  controllers: [ResultController],
  providers: [ResultService, SettlementService, ResultSweepService],
  exports: [ResultService, SettlementService],
})
export class ResultModule {}
