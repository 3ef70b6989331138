import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { FlashMessage, LevelSchema } from "../flash/message";

const SendFlashInput = z.object({
  content: z.string().min(1).max(500),
  level: LevelSchema.default("info"),
});

/**
 * Demo endpoints: POST queues a flash message and redirects (post/redirect/get),
 * GET renders whatever arrived with the request.
 */
export async function messageRoutes(app: FastifyInstance) {
  app.get("/messages", async (req) => ({
    messages: req.flash.incoming.all().map((message) => message.toJSON()),
  }));

  app.post("/messages", async (req, reply) => {
    const parsed = SendFlashInput.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const { content, level } = parsed.data;
    const accepted = req.flash.send(new FlashMessage(content, level));
    req.log.debug({ plane: "flash", level, accepted }, "flash.send");

    return reply.code(303).header("location", "/messages").send();
  });
}
