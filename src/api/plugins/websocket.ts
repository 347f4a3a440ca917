import websocket from '@fastify/websocket';
import type { FastifyPluginAsync } from 'fastify';
import { addClient, getClientCount } from '../ws-hub.js';

export const websocketPlugin: FastifyPluginAsync = async (app) => {
  await app.register(websocket);

  // Pushes batch:completed, probe:progress and config:applied events
  app.get('/ws', { websocket: true }, (socket) => {
    addClient(socket);
    socket.send(JSON.stringify({ event: 'connected', clients: getClientCount(), ts: Date.now() }));
  });
};
