import { ConfigError } from '../core/errors';
import { RebalancerConfig } from '../core/schema';
import { Logger } from '../core/types';
import { BrokerClient } from '../integrations/brokerClient';
import { StubBroker } from './broker.stub';
import { BrokerApi } from './broker.types';
import { OpenApiBroker } from './openapi/openApiBroker';

export type BrokerProvider = 'stub' | 'openapi';

export interface BrokerSelection {
  broker: BrokerApi;
  provider: BrokerProvider;
  accountId?: string;
}

type Env = Record<string, string | undefined>;

/**
 * `BROKER_PROVIDER=stub` always gets the in-memory broker. Otherwise credentials
 * select the signed HTTP broker; without them a dry run falls back to the stub and
 * a live run is a configuration error.
 */
export const getBroker = (
  config: RebalancerConfig,
  dryRun: boolean,
  env: Env = process.env,
  logger: Logger = console
): BrokerSelection => {
  const requested = (env.BROKER_PROVIDER || '').toLowerCase();
  if (requested === 'stub') {
    return { broker: new StubBroker({ currency: config.currency }), provider: 'stub' };
  }
  const appKey = env.BROKER_APP_KEY;
  const appSecret = env.BROKER_APP_SECRET;
  if (!appKey || !appSecret) {
    if (!dryRun) {
      throw new ConfigError('Live trading requires BROKER_APP_KEY and BROKER_APP_SECRET');
    }
    logger.warn('Broker credentials missing; dry run uses the stub broker.');
    return { broker: new StubBroker({ currency: config.currency }), provider: 'stub' };
  }
  const client = new BrokerClient({
    appKey,
    appSecret,
    baseUrl: env.BROKER_BASE_URL || config.api.baseUrl,
    requestTimeoutMs: config.api.requestTimeoutMs
  });
  return { broker: new OpenApiBroker(client), provider: 'openapi', accountId: env.BROKER_ACCOUNT_ID || undefined };
};

export { StubBroker, OpenApiBroker };
