import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { GroupMembership } from './entities/group-membership.entity';
import { GroupDirectoryService } from './group-directory.service';
import { MembershipController } from './membership.controller';
import { CommonModule } from '../common/common.module';

@Module({
  imports: [TypeOrmModule.forFeature([GroupMembership]), CommonModule],
  controllers: [MembershipController],
  providers: [GroupDirectoryService],
  exports: [GroupDirectoryService],
})
export class MembershipModule {}
