import { Body, Controller, Param, Put, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { GroupDirectoryService } from './group-directory.service';
import { UpsertMembershipDto } from './dto/upsert-membership.dto';
import { ActorGuard } from '../common/guards/actor.guard';
import { AdminGuard } from '../common/guards/admin.guard';

@Controller('groups/:groupId/members')
@ApiTags('Groups')
@ApiHeader({ name: 'x-actor-id', required: true })
@ApiHeader({ name: 'x-actor-role', required: true, description: 'Must be admin' })
export class MembershipController {
  constructor(private readonly groupDirectoryService: GroupDirectoryService) {}

  @Put(':userId')
  @UseGuards(ActorGuard, AdminGuard)
  @ApiOperation({ summary: 'Mirror a group membership from the identity service (Admin only)' })
  @ApiResponse({ status: 200, description: 'Membership stored' })
  async upsertMembership(
    @Param('groupId') groupId: string,
    @Param('userId') userId: string,
    @Body() dto: UpsertMembershipDto,
  ) {
    const membership = await this.groupDirectoryService.upsertMembership(groupId, userId, {
      active: dto.active,
      registeredAt: dto.registeredAt === undefined ? undefined : new Date(dto.registeredAt),
    });

    return {
      groupId: membership.groupId,
      userId: membership.userId,
      active: membership.active,
      registeredAt: membership.registeredAt,
      joinedAt: membership.joinedAt,
    };
  }
}
