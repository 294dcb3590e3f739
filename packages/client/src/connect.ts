import type { ClientConfig } from './config/clientConfig.js';
import { versionCapsOf } from './config/clientConfig.js';
import {
  type Environment,
  type EnvironmentDeclaration,
  initEnvironment,
  type MultiHandlers,
  type SingleHandlers,
} from './Environment.js';
import { connectWebSocketTransport } from './transports/WebSocketTransport.js';
import { logger, setLogLevel } from './utils/logger.js';

/**
 * Connect to the registry server named in `config` and build an
 * environment over the connection.
 *
 * @example
 * ```typescript
 * const env = await connectEnvironment(loadClientConfig(), {
 *   singles: { compositor: new SimpleGlobal(Compositor) },
 *   multis: { outputs: new MultiGlobal(Output) },
 *   extras: {},
 * });
 * const compositor = env.requireGlobal(Compositor);
 * ```
 */
export async function connectEnvironment<
  TSingles extends SingleHandlers,
  TMultis extends MultiHandlers,
  TExtras extends object,
>(
  config: ClientConfig,
  declaration: EnvironmentDeclaration<TSingles, TMultis, TExtras>
): Promise<Environment<TSingles, TMultis, TExtras>> {
  setLogLevel(config.logging.level);

  const transport = await connectWebSocketTransport(config.server.url);
  try {
    return await initEnvironment(transport, declaration, { versionCaps: versionCapsOf(config) });
  } catch (error) {
    logger.error('Closing registry connection after failed initialization', {
      url: config.server.url,
    });
    transport.close();
    throw error;
  }
}
