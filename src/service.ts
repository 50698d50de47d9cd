import { globalConfig } from './config';
import type { Repository } from './repository';
import type { Key } from './token';

/**
 * Long-lived state and logic shared by several view models.
 *
 * Prefer handing services to view models through their factories; the
 * lookups here go through the configured locator.
 */
export abstract class Service {
  getService<T extends Service>(key: Key<T>): T {
    return globalConfig.locator.get(key);
  }

  getRepository<T extends Repository>(key: Key<T>): T {
    return globalConfig.locator.get(key);
  }
}
