/**
 * core/registry.ts
 *
 * Holds the clipboard and dialog backend implementations. Each backend file
 * registers its provider on import; clipboard/index.ts and dialog/index.ts
 * import them in priority order, so registration order is detection order.
 */

import {
  BackendProvider,
  ClipboardBackend,
  ClipboardBackendOptions,
  DialogBackend,
  DialogBackendOptions
} from './types';
import { NoBackendError, UnknownBackendError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

export class BackendRegistry<TBackend, TOptions> {
  /** provider name → provider, in registration order */
  private readonly providers = new Map<string, BackendProvider<TBackend, TOptions>>();

  constructor(readonly kind: string) {}

  register(provider: BackendProvider<TBackend, TOptions>): void {
    if (this.providers.has(provider.name)) {
      log.warn({ kind: this.kind, backend: provider.name }, 'Backend already registered — overwriting');
    }
    this.providers.set(provider.name, provider);
    log.debug({ kind: this.kind, backend: provider.name }, 'Backend registered');
  }

  list(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * 'auto' → first provider whose detect() accepts the environment.
   * Any other name → that provider, whether or not it would be detected.
   */
  resolve(preference: string, env: NodeJS.ProcessEnv): BackendProvider<TBackend, TOptions> {
    if (preference !== 'auto') {
      const named = this.providers.get(preference);
      if (!named) throw new UnknownBackendError(this.kind, preference);
      log.debug({ kind: this.kind, backend: named.name }, 'Backend chosen by configuration');
      return named;
    }

    for (const provider of this.providers.values()) {
      if (provider.detect(env)) {
        log.debug({ kind: this.kind, backend: provider.name }, 'Backend detected');
        return provider;
      }
    }

    throw new NoBackendError(this.kind, this.list());
  }

  create(preference: string, env: NodeJS.ProcessEnv, options: TOptions): TBackend {
    return this.resolve(preference, env).create(options);
  }
}

export const clipboardBackends = new BackendRegistry<ClipboardBackend, ClipboardBackendOptions>('clipboard');
export const dialogBackends = new BackendRegistry<DialogBackend, DialogBackendOptions>('dialog');
