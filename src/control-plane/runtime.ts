import { getConfig } from '../config/index.js';
import { CommandActionProvider } from '../executor/command-provider.js';
import {
  EnvCredentialStore,
  StaticCredentialStore,
  type CredentialStore,
} from '../executor/credential-store.js';
import type { RemoteActionProvider } from '../executor/provider.js';
import { SimulatedActionProvider } from '../executor/simulated-provider.js';
import { loadManifest } from '../manifest/loader.js';
import { createProvisioner, type Provisioner } from '../orchestrator/provisioner.js';

export interface RuntimeOptions {
  manifest: string;
  simulate?: boolean;
}

/**
 * Load a manifest and wire a provisioner for it. Simulated runs use an
 * in-process provider and placeholder credentials.
 */
export async function createRuntime(options: RuntimeOptions): Promise<Provisioner> {
  const config = getConfig();
  const manifest = await loadManifest(options.manifest);

  let provider: RemoteActionProvider;
  let credentials: CredentialStore;

  if (options.simulate) {
    provider = new SimulatedActionProvider();
    credentials = new StaticCredentialStore(
      Object.fromEntries(
        manifest.targets.map((target) => [
          target.credentialRef,
          { username: 'simulated', password: 'simulated' },
        ])
      )
    );
  } else {
    provider = new CommandActionProvider({
      command: config.providerCommand,
      timeoutMs: config.actionTimeoutMs,
    });
    credentials = new EnvCredentialStore();
  }

  return createProvisioner({ manifest, provider, credentials, config });
}
