import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Match } from './entities/match.entity';
import { DeadlineService } from './deadline.service';
import { DeadlineSweepService } from './deadline-sweep.service';
import { MatchController } from './match.controller';
import { AuditModule } from '../audit/audit.module';
import { NotificationModule } from '../notification/notification.module';
import { CommonModule } from '../common/common.module';

@Module({
  imports: [TypeOrmModule.forFeature([Match]), AuditModule, NotificationModule, CommonModule],
  controllers: [MatchController],
  providers: [DeadlineService, DeadlineSweepService],
  exports: [DeadlineService, TypeOrmModule],
})
export class MatchModule {}
