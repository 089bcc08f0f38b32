/**
 * Admin broadcasts
 *
 * Messages are not delivered anywhere; each intended recipient is logged.
 */

import { logger } from "./logger";
import { UserService } from "./userService";

export interface BroadcastResult {
  recipients: number;
}

export class BroadcastService {
  constructor(private readonly users: UserService) {}

  async broadcast(message: string, senderId: number): Promise<BroadcastResult> {
    const users = await this.users.list();

    for (const user of users) {
      logger.info("Broadcast message queued", {
        recipientId: user.id,
        senderId,
      });
    }
    logger.info("Broadcast sent", {
      senderId,
      recipients: users.length,
      message,
    });

    return { recipients: users.length };
  }
}
