import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Prediction } from './entities/prediction.entity';
import { PredictionService } from './prediction.service';
import { PredictionController } from './prediction.controller';
import { ScoringService } from './scoring.service';
import { ScoringPoints, SCORING_CONSTANTS, SCORING_POINTS } from './types/scoring.types';
import { MatchModule } from '../match/match.module';
import { MembershipModule } from '../membership/membership.module';
import { CommonModule } from '../common/common.module';

@Module({
  imports: [TypeOrmModule.forFeature([Prediction]), MatchModule, MembershipModule, CommonModule],
  controllers: [PredictionController],
  providers: [
    PredictionService,
    ScoringService,
    {
      provide: SCORING_POINTS,
      useFactory: (configService: ConfigService): ScoringPoints => ({
        exactScore:
          configService.get<number>('betting.points.exactScore') ??
          SCORING_CONSTANTS.DEFAULT_POINTS.exactScore,
        correctWinner:
          configService.get<number>('betting.points.correctWinner') ??
          SCORING_CONSTANTS.DEFAULT_POINTS.correctWinner,
        miss: configService.get<number>('betting.points.miss') ?? SCORING_CONSTANTS.DEFAULT_POINTS.miss,
      }),
      inject: [ConfigService],
    },
  ],
  exports: [PredictionService, ScoringService, TypeOrmModule],
})
export class PredictionModule {}
