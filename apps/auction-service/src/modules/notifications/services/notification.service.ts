import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Actor, assertOwner, NotFoundError, NotificationType, UserRole } from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../../database/auction-store';
import { MetricsService } from '../../../metrics/metrics.service';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { User } from '../../auth/entities/user.entity';
import { Notification } from '../entities/notification.entity';

/** What each workflow event tells its recipient. */
export type NotificationEvent =
  | { type: NotificationType.ITEM_SUBMITTED; sellRequestId: string; itemTitle: string }
  | { type: NotificationType.PRELIMINARY_VALUATION; sellRequestId: string; itemTitle: string; price: string }
  | { type: NotificationType.MANAGER_APPROVAL_NEEDED; sellRequestId: string; itemTitle: string; price: string }
  | { type: NotificationType.ITEM_APPROVED; sellRequestId: string; itemTitle: string; price: string }
  | { type: NotificationType.ITEM_REJECTED; sellRequestId: string; itemTitle: string; reason: string }
  | {
      type: NotificationType.AUCTION_WON;
      sessionId: string;
      sessionItemId: string;
      itemTitle: string;
      amount: string;
      paymentId: string;
    };

interface Rendered {
  title: string;
  message: string;
  data: Record<string, string>;
}

export function renderNotification(event: NotificationEvent): Rendered {
  switch (event.type) {
    case NotificationType.ITEM_SUBMITTED:
      return {
        title: 'Sell request received',
        message: `Your sell request for "${event.itemTitle}" was submitted. Our staff will appraise it shortly.`,
        data: { sell_request_id: event.sellRequestId },
      };
    case NotificationType.PRELIMINARY_VALUATION:
      return {
        title: 'Preliminary valuation ready',
        message: `"${event.itemTitle}" was valued at ${event.price}. Please bring the piece in for the final appraisal.`,
        data: { sell_request_id: event.sellRequestId, price: event.price },
      };
    case NotificationType.MANAGER_APPROVAL_NEEDED:
      return {
        title: 'Valuation awaiting approval',
        message: `The final valuation of "${event.itemTitle}" (${event.price}) needs a manager's approval.`,
        data: { sell_request_id: event.sellRequestId, price: event.price },
      };
    case NotificationType.ITEM_APPROVED:
      return {
        title: 'Item approved for auction',
        message: `"${event.itemTitle}" was approved at ${event.price}. Accept the valuation to list it.`,
        data: { sell_request_id: event.sellRequestId, price: event.price },
      };
    case NotificationType.ITEM_REJECTED:
      return {
        title: 'Sell request rejected',
        message: `Your sell request for "${event.itemTitle}" was rejected: ${event.reason}`,
        data: { sell_request_id: event.sellRequestId },
      };
    case NotificationType.AUCTION_WON:
      return {
        title: 'You won the auction',
        message: `You won "${event.itemTitle}" with a bid of ${event.amount}. Please complete your payment.`,
        data: {
          session_id: event.sessionId,
          session_item_id: event.sessionItemId,
          amount: event.amount,
          payment_id: event.paymentId,
        },
      };
  }
}

/**
 * Persisted in-app notifications. Callers emit after their own transaction
 * has committed; a failed write is logged and never fails the workflow
 * step that triggered it.
 */
@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    @Optional() @Inject(MetricsService) private readonly metrics?: MetricsService,
  ) {}

  async notify(recipientIds: string[], event: NotificationEvent): Promise<Notification[]> {
    if (recipientIds.length === 0) return [];
    const rendered = renderNotification(event);
    try {
      const rows = await this.store.transaction(async (m) => {
        const rows: Notification[] = [];
        for (const recipientId of recipientIds) {
          rows.push(
            await m.insert(Notification, {
              recipientId,
              type: event.type,
              title: rendered.title,
              message: rendered.message,
              data: rendered.data,
              isRead: false,
              readAt: null,
            }),
          );
        }
        return rows;
      });
      this.metrics?.notificationsCreatedTotal.inc({ type: event.type }, rows.length);
      return rows;
    } catch (err) {
      this.logger.error(
        JSON.stringify({
          event: 'notification_failed',
          type: event.type,
          recipients: recipientIds.length,
          error_message: err instanceof Error ? err.message : String(err),
        }),
      );
      return [];
    }
  }

  /** Fans out to every active user holding `role`. */
  async notifyRole(role: UserRole, event: NotificationEvent): Promise<Notification[]> {
    const users = await this.store.manager.find(User, { where: { role, isActive: true } });
    return this.notify(users.map((user) => user.id), event);
  }

  async list(actor: Actor, query: PageQuery, unreadOnly = false): Promise<Paginated<Notification>> {
    const window = pageWindow(query);
    const [data, total] = await this.store.manager.findAndCount(Notification, {
      where: unreadOnly ? { recipientId: actor.userId, isRead: false } : { recipientId: actor.userId },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  async unreadCount(actor: Actor): Promise<{ count: number }> {
    const count = await this.store.manager.count(Notification, { recipientId: actor.userId, isRead: false });
    return { count };
  }

  async markRead(actor: Actor, id: string): Promise<Notification> {
    return this.store.transaction(async (m) => {
      const notification = await m.findOne(Notification, { id }, 'pessimistic_write');
      if (!notification) {
        throw new NotFoundError('Notification', id);
      }
      assertOwner(actor, notification.recipientId, 'read this notification');
      if (notification.isRead) {
        return notification;
      }
      notification.isRead = true;
      notification.readAt = new Date();
      return m.save(notification);
    });
  }

  async markAllRead(actor: Actor): Promise<{ updated: number }> {
    const updated = await this.store.transaction(async (m) => {
      const unread = await m.find(Notification, {
        where: { recipientId: actor.userId, isRead: false },
        lock: 'pessimistic_write',
      });
      const readAt = new Date();
      for (const notification of unread) {
        notification.isRead = true;
        notification.readAt = readAt;
        await m.save(notification);
      }
      return unread.length;
    });
    this.logger.log(JSON.stringify({ event: 'notifications_read', user_id: actor.userId, updated }));
    return { updated };
  }
}
