import { Controller, DefaultValuePipe, Get, Param, ParseIntPipe, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AuditService } from './audit.service';
import { ActorGuard } from '../common/guards/actor.guard';
import { AdminGuard } from '../common/guards/admin.guard';

const MAX_HISTORY_LIMIT = 1000;

@Controller('audit')
@ApiTags('Audit')
@ApiHeader({ name: 'x-actor-id', required: true })
@ApiHeader({ name: 'x-actor-role', required: true, description: 'Must be admin' })
export class AuditController {
  constructor(private readonly auditService: AuditService) {}

  @Get(':entityId')
  @UseGuards(ActorGuard, AdminGuard)
  @ApiOperation({ summary: 'Audit trail of a match or result, oldest first (Admin only)' })
  @ApiQuery({ name: 'limit', required: false, type: Number })
  @ApiResponse({ status: 200, description: 'Returns audit records' })
  async getHistory(
    @Param('entityId') entityId: string,
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ) {
    const bounded = Math.min(Math.max(limit, 1), MAX_HISTORY_LIMIT);
    const records = await this.auditService.collectHistory(entityId, bounded);

    return {
      entityId,
      records: records.map((r) => ({
        id: r.id,
        sequence: r.sequence,
        kind: r.kind,
        actorId: r.actorId,
        before: r.beforeValue,
        after: r.afterValue,
        recordedAt: r.recordedAt,
      })),
    };
  }
}
