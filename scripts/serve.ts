import { enableDefaultMetrics } from '../src/metrics';
import { loadServerEnv } from '../src/env';
import { log } from '../src/log';
import { buildServer } from '../src/server';

const env = loadServerEnv();
enableDefaultMetrics();

const { server } = buildServer(env, {
  mediaHandlers: {
    onStart: (session) => {
      log.info(
        { event: 'media_stream_ready', stream_sid: session.streamSid, parameters: session.customParameters },
        'media stream ready',
      );
    },
    onDtmf: (session, message) => {
      // One mark per digit.
      session.sendMark(`dtmf-${message.dtmf.digit}`);
    },
    onMark: (session, message) => {
      log.debug({ event: 'media_stream_mark', stream_sid: session.streamSid, mark: message.mark.name }, 'mark played');
    },
  },
});

server.listen(env.PORT, () => {
  log.info({ port: env.PORT }, 'server listening');
});
