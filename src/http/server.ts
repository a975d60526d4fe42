import { Server } from 'node:http';
import { AddressInfo } from 'node:net';
import { WikiCacheContext } from '../CacheContext';
import { createApp } from './app';
import LibLogger from '../logger';

const logger = LibLogger.get('server');

/**
 * Start the HTTP API. Port 0 picks a free port; read it back with `serverPort`.
 */
export const startServer = (context: WikiCacheContext, host: string, port: number): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = createApp(context).listen(port, host);
    server.once('listening', () => {
      logger.info('Listening', { host, port: serverPort(server) });
      resolve(server);
    });
    server.once('error', reject);
  });

export const serverPort = (server: Server): number => {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
};

export const stopServer = (server: Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
