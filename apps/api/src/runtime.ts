// =====================================================
// Runtime
// =====================================================
// Builds the long-lived services once and wires them together.
// Nothing here is a module-level singleton: the entry point
// builds one runtime, tests build as many as they need with
// fakes swapped in.

import { config } from './config';
import { systemClock, type Clock } from './lib/clock';
import { logger } from './utils/logger';
import {
  APNS_HOSTS,
  ApnsClient,
  ApnsTokenProvider,
  Http2PushTransport,
  type ApnsCredentials,
  type PushTransport,
  type TokenSource,
} from './services/apns';
import { ContentSource, FeedRefresher, GoogleFeedProvider, type FeedProvider } from './services/content';
import { DispatchScheduler } from './services/dispatch';
import { DeviceRegistry } from './services/registry/device-registry';

export interface RuntimeOptions {
  credentials: ApnsCredentials;
  clock?: Clock;
  /** Defaults to an HTTP/2 connection to the gateway for `credentials.environment` */
  transport?: PushTransport;
  /** Defaults to a provider signing with `credentials.privateKey` */
  tokenSource?: TokenSource;
  /** `null` disables the calendar/mail feed */
  feedProvider?: FeedProvider | null;
  rotationIntervalMs?: number;
  feedRefreshIntervalMs?: number;
  /** Public URL calendar push notifications are delivered to; empty disables channels */
  webhookUrl?: string;
}

export interface Runtime {
  readonly clock: Clock;
  readonly registry: DeviceRegistry;
  readonly contentSource: ContentSource;
  readonly feedRefresher: FeedRefresher;
  readonly tokenSource: TokenSource;
  readonly client: ApnsClient;
  readonly transport: PushTransport;
  readonly scheduler: DispatchScheduler;
  readonly webhookUrl: string;
  readonly startedAt: number;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const clock = options.clock ?? systemClock;
  const { credentials } = options;

  const registry = new DeviceRegistry(clock);

  const feedProvider = options.feedProvider === undefined ? new GoogleFeedProvider({ clock }) : options.feedProvider;
  const feedRefresher = new FeedRefresher(feedProvider, registry, {
    intervalMs: options.feedRefreshIntervalMs ?? config.feed.refreshIntervalMs,
    clock,
  });
  const contentSource = new ContentSource(feedRefresher, clock);

  const tokenSource = options.tokenSource ?? new ApnsTokenProvider(credentials, clock);
  const transport =
    options.transport ?? new Http2PushTransport(APNS_HOSTS[credentials.environment], config.apns.requestTimeoutMs);
  const client = new ApnsClient(transport, { bundleId: credentials.bundleId, tokenSource });

  const scheduler = new DispatchScheduler(registry, contentSource, client, tokenSource, {
    intervalMs: options.rotationIntervalMs ?? config.scheduler.rotationIntervalMs,
  });

  // Feed changes push straight to the user's devices
  feedRefresher.setChangeHandler((userId) => scheduler.dispatchToUser(userId));

  return {
    clock,
    registry,
    contentSource,
    feedRefresher,
    tokenSource,
    client,
    transport,
    scheduler,
    webhookUrl: options.webhookUrl ?? config.feed.webhookUrl,
    startedAt: clock.now(),
  };
}

export function startRuntime(runtime: Runtime): void {
  runtime.scheduler.start();
  if (runtime.feedRefresher.isEnabled) {
    runtime.feedRefresher.start();
  }
}

/**
 * Stop both loops, let in-flight dispatches finish, then close the gateway connection.
 */
export async function stopRuntime(runtime: Runtime): Promise<void> {
  await runtime.scheduler.stop();
  await runtime.feedRefresher.stop();
  await runtime.transport.close();
  logger.info('[Runtime] Stopped');
}
