import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { ConversationRepository } from "../db/types.js";
import type { Logger } from "../logger.js";

export interface RoutesDeps {
  readonly conversations: ConversationRepository;
  readonly connections: {
    readonly activeConnections: number;
    isConnected(conversationId: string): boolean;
  };
  readonly logger: Logger;
}

const limitSchema = z.coerce.number().int().positive().optional();

export function createApiRouter(deps: RoutesDeps): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", activeConnections: deps.connections.activeConnections });
  });

  router.get("/conversations/:id", (req: Request, res: Response) => {
    const limit = limitSchema.safeParse(req.query.limit);
    if (!limit.success) {
      res.status(400).json({ error: "limit must be a positive integer" });
      return;
    }

    const conversationId = req.params.id ?? "";
    const total = deps.conversations.countByConversation(conversationId);
    if (total === 0) {
      res.status(404).json({ error: "Conversation not found" });
      return;
    }

    const messages = deps.conversations.findByConversation(conversationId, limit.data);
    res.json({
      conversation_id: conversationId,
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
        tool_calls: m.toolCalls,
        timestamp: m.createdAt,
      })),
      message_count: total,
    });
  });

  router.delete("/conversations/:id", (req: Request, res: Response) => {
    const conversationId = req.params.id ?? "";
    // A live agent process still holds the history in its context
    if (deps.connections.isConnected(conversationId)) {
      res.status(409).json({ error: "Conversation is in use" });
      return;
    }

    const removed = deps.conversations.removeConversation(conversationId);
    deps.logger.info({ conversationId, removed }, "Conversation deleted");
    res.status(204).end();
  });

  return router;
}
