/**
 * Notifier construction from configuration
 */

import type { NotifierConfig } from '$types/config';
import type { Notifier, NotifierDependencies } from './types';
import { createSimplePushNotifier } from './simplepush';
import { createSlackNotifier } from './slack';

/**
 * Build the notifier for one configuration entry
 */
export function createNotifier(config: NotifierConfig, dependencies: NotifierDependencies): Notifier {
  switch (config.type) {
    case 'simplepush':
      return createSimplePushNotifier(config, dependencies);
    case 'slack':
      return createSlackNotifier(config, dependencies);
    default: {
      const unsupported: never = config;
      throw new Error('Unsupported notifier: ' + JSON.stringify(unsupported));
    }
  }
}

/**
 * Build every configured notifier, in configuration order
 */
export function createNotifiers(
  configs: readonly NotifierConfig[],
  dependencies: NotifierDependencies
): Notifier[] {
  return configs.map((config) => createNotifier(config, dependencies));
}
