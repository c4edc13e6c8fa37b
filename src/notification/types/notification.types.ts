/**
 * Logical events handed to the notification collaborator. Delivery (push,
 * polling, sockets) is its concern; this service only publishes payloads.
 */
export type LeagueEvent =
  | {
      type: 'deadline_changed';
      matchId: string;
      groupId: string;
      previousDeadline: string;
      deadline: string;
      actorId: string;
    }
  | {
      type: 'provisional_result_posted';
      matchId: string;
      groupId: string;
      homeScore: number;
      awayScore: number;
      correction: boolean;
    }
  | {
      type: 'result_finalized';
      matchId: string;
      groupId: string;
      homeScore: number;
      awayScore: number;
      newlySettled: number;
    }
  | {
      type: 'match_rescheduled';
      matchId: string;
      groupId: string;
      previousStart: string;
      scheduledStart: string;
      deadline: string;
    }
  | {
      type: 'match_cancelled';
      matchId: string;
      groupId: string;
      voidedPredictions: number;
    }
  | {
      type: 'leaderboard_changed';
      groupId: string;
      matchId: string;
    }
  | {
      type: 'finalization_overdue';
      matchId: string;
      groupId: string;
      enteredAt: string;
    };

export interface PublishedEvent {
  event: LeagueEvent;
  occurredAt: string;
}
