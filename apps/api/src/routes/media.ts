import { FastifyPluginAsync } from "fastify";
import { MediaRelaySession, type VoiceRagSettings } from "../acs/mediaRelaySession.js";
import type { AudioPacerOptions } from "../acs/audioPacer.js";

export interface MediaRoutesOptions {
  voiceRag: VoiceRagSettings;
  sessions: Set<MediaRelaySession>;
  pacer?: AudioPacerOptions;
}

const mediaRoutes: FastifyPluginAsync<MediaRoutesOptions> = async (fastify, options) => {
  const { sessions } = options;

  // Bidirectional media streaming WebSocket for answered calls
  fastify.route({
    method: "GET",
    url: "/ws",
    handler: async (_request, reply) => {
      return reply.code(400).send({ error: "Expected a WebSocket upgrade" });
    },
    wsHandler: async (socket, request) => {
      const session = new MediaRelaySession(socket, {
        voiceRag: options.voiceRag,
        pacer: options.pacer,
        logger: request.log,
      });
      sessions.add(session);
      request.log.info({ sessionId: session.id }, "✅ Media WebSocket accepted, streaming starting");

      try {
        const summary = await session.run();
        request.log.info(summary, "Media relay session finished");
      } finally {
        sessions.delete(session);
      }
    },
  });

  fastify.addHook("onClose", async () => {
    await Promise.all([...sessions].map((session) => session.close("shutdown")));
  });
};

export default mediaRoutes;
