import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { GroupMembership } from './entities/group-membership.entity';
import { Clock, CLOCK } from '../common/clock/clock';
import { isUniqueViolation } from '../common/helpers/optimistic-retry.helper';

export interface MembershipUpdate {
  active?: boolean;
  registeredAt?: Date | null;
}

@Injectable()
export class GroupDirectoryService {
  private readonly logger = new Logger(GroupDirectoryService.name);

  constructor(
    @InjectRepository(GroupMembership)
    private membershipRepository: Repository<GroupMembership>,
    @Inject(CLOCK) private clock: Clock,
  ) {}

  async isMember(userId: string, groupId: string): Promise<boolean> {
    const membership = await this.membershipRepository.findOne({
      where: { groupId, userId, active: true },
    });
    return membership !== null;
  }

  /**
   * Registration timestamps of the group's members, keyed by user id.
   * Users without a known timestamp are absent from the map.
   */
  async getRegistrationTimes(groupId: string): Promise<Map<string, Date>> {
    const memberships = await this.membershipRepository.find({ where: { groupId } });
    const times = new Map<string, Date>();

    for (const membership of memberships) {
      if (membership.registeredAt) {
        times.set(membership.userId, membership.registeredAt);
      }
    }

    return times;
  }

  /**
   * Creates or updates a membership as reported by the identity collaborator.
   */
  async upsertMembership(
    groupId: string,
    userId: string,
    update: MembershipUpdate,
  ): Promise<GroupMembership> {
    const existing = await this.membershipRepository.findOne({ where: { groupId, userId } });

    if (existing) {
      const changes: Partial<GroupMembership> = {};
      if (update.active !== undefined) changes.active = update.active;
      if (update.registeredAt !== undefined) changes.registeredAt = update.registeredAt;

      await this.membershipRepository.update({ groupId, userId }, changes);
      return { ...existing, ...changes };
    }

    const membership = this.membershipRepository.create({
      groupId,
      userId,
      active: update.active ?? true,
      registeredAt: update.registeredAt ?? null,
      joinedAt: this.clock.now(),
    });

    try {
      const saved = await this.membershipRepository.save(membership);
      this.logger.log(`User ${userId} joined group ${groupId}`);
      return saved;
    } catch (error) {
      // Another request created it first
      if (isUniqueViolation(error)) {
        return this.upsertMembership(groupId, userId, update);
      }
      throw error;
    }
  }
}
