import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  Actor,
  assertOwner,
  assertRole,
  BusinessRuleViolationError,
  ConflictError,
  EnrollmentStatus,
  InvalidStateTransitionError,
  NotFoundError,
  SessionStatus,
  UserRole,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../../database/auction-store';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { AuctionSession } from '../entities/auction-session.entity';
import { Enrollment } from '../entities/enrollment.entity';

const ENROLLABLE: SessionStatus[] = [SessionStatus.SCHEDULED, SessionStatus.OPEN];

@Injectable()
export class EnrollmentService {
  private readonly logger = new Logger(EnrollmentService.name);

  constructor(@Inject(AUCTION_STORE) private readonly store: AuctionStore) {}

  /** Returns the caller's existing enrollment unchanged when there is one. */
  async enroll(actor: Actor, sessionId: string): Promise<Enrollment> {
    assertRole(actor, UserRole.MEMBER, 'Enrolling in a session');

    try {
      return await this.store.transaction(async (m) => {
        const session = await m.findOne(AuctionSession, { id: sessionId }, 'pessimistic_read');
        if (!session) {
          throw new NotFoundError('AuctionSession', sessionId);
        }

        const existing = await m.findOne(Enrollment, { sessionId, userId: actor.userId });
        if (existing) {
          return existing;
        }

        if (!ENROLLABLE.includes(session.status)) {
          throw new BusinessRuleViolationError(
            'SESSION_NOT_ENROLLABLE',
            `Enrollment is closed for sessions in status ${session.status}`,
            { session_status: session.status },
          );
        }

        const autoApprove = session.rules.requireRegistration === false;
        const enrollment = await m.insert(Enrollment, {
          sessionId,
          userId: actor.userId,
          status: autoApprove ? EnrollmentStatus.APPROVED : EnrollmentStatus.PENDING,
          reviewedBy: null,
          reviewedAt: autoApprove ? new Date() : null,
        });

        this.logger.log(
          JSON.stringify({
            event: 'enrollment_created',
            enrollment_id: enrollment.id,
            session_id: sessionId,
            user_id: actor.userId,
            status: enrollment.status,
          }),
        );
        return enrollment;
      });
    } catch (err) {
      // Double submit: the pair is unique, so the other request's row stands.
      if (err instanceof ConflictError) {
        const winner = await this.store.manager.findOne(Enrollment, { sessionId, userId: actor.userId });
        if (winner) return winner;
      }
      throw err;
    }
  }

  async approve(actor: Actor, enrollmentId: string): Promise<Enrollment> {
    assertRole(actor, UserRole.STAFF, 'Approving an enrollment');
    return this.review(actor, enrollmentId, EnrollmentStatus.APPROVED, 'approve');
  }

  async reject(actor: Actor, enrollmentId: string): Promise<Enrollment> {
    assertRole(actor, UserRole.STAFF, 'Rejecting an enrollment');
    return this.review(actor, enrollmentId, EnrollmentStatus.REJECTED, 'reject');
  }

  async cancel(actor: Actor, enrollmentId: string): Promise<Enrollment> {
    const cancellable = [EnrollmentStatus.PENDING, EnrollmentStatus.APPROVED];
    return this.store.transaction(async (m) => {
      const enrollment = await m.findOne(Enrollment, { id: enrollmentId }, 'pessimistic_write');
      if (!enrollment) {
        throw new NotFoundError('Enrollment', enrollmentId);
      }
      assertOwner(actor, enrollment.userId, 'cancel this enrollment');
      if (!cancellable.includes(enrollment.status)) {
        throw new InvalidStateTransitionError('Enrollment', enrollment.status, cancellable, 'cancel');
      }
      enrollment.status = EnrollmentStatus.CANCELED;
      return m.save(enrollment);
    });
  }

  async list(
    actor: Actor,
    sessionId: string,
    filters: { status?: EnrollmentStatus },
    query: PageQuery,
  ): Promise<Paginated<Enrollment>> {
    assertRole(actor, UserRole.STAFF, 'Listing enrollments');
    const window = pageWindow(query);
    const [data, total] = await this.store.manager.findAndCount(Enrollment, {
      where: { sessionId, status: filters.status },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  private async review(
    actor: Actor,
    enrollmentId: string,
    to: EnrollmentStatus,
    action: string,
  ): Promise<Enrollment> {
    const enrollment = await this.store.transaction(async (m) => {
      const enrollment = await m.findOne(Enrollment, { id: enrollmentId }, 'pessimistic_write');
      if (!enrollment) {
        throw new NotFoundError('Enrollment', enrollmentId);
      }
      if (enrollment.status !== EnrollmentStatus.PENDING) {
        throw new InvalidStateTransitionError('Enrollment', enrollment.status, [EnrollmentStatus.PENDING], action);
      }
      enrollment.status = to;
      enrollment.reviewedBy = actor.userId;
      enrollment.reviewedAt = new Date();
      return m.save(enrollment);
    });

    this.logger.log(
      JSON.stringify({ event: 'enrollment_reviewed', enrollment_id: enrollmentId, status: to, actor_id: actor.userId }),
    );
    return enrollment;
  }
}
