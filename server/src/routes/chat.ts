/**
 * Chat Route
 */

import type { Hono } from "hono";
import { z } from "zod";
import { runChatTurn, type ChatDeps } from "../dispatch/chat.js";
import { readJsonBody } from "./devices.js";

const chatBodySchema = z.object({
  messages: z.unknown().transform((value) => value ?? []),
});

export function registerChatRoutes(app: Hono, deps: ChatDeps): void {
  app.post("/api/chat", async (c) => {
    const body = chatBodySchema.parse(await readJsonBody(c));
    const outcome = await runChatTurn(deps, body.messages);
    return c.json({ reply: outcome.reply }, outcome.status);
  });
}
