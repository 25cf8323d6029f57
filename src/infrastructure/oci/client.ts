import * as common from 'oci-common';
import * as objectstorage from 'oci-objectstorage';
import * as aivision from 'oci-aivision';
import * as functions from 'oci-functions';
import { logger } from '../logger.js';
import type { AppConfig } from '../config.js';
import type { ObjectStorageClient } from './object-storage.js';
import type { VisionClient } from './vision.js';
import type { FunctionsInvokeClient } from './document-generator.js';

export interface OciClients {
  objectStorage: ObjectStorageClient;
  vision: VisionClient;
  functionsInvoke: FunctionsInvokeClient;
}

async function createAuthProvider(auth: AppConfig['auth']): Promise<common.AuthenticationDetailsProvider> {
  if (auth.mode === 'config_file') {
    return new common.ConfigFileAuthenticationDetailsProvider(auth.configFile, auth.profile);
  }
  return common.ResourcePrincipalAuthenticationDetailsProvider.builder();
}

/** @throws {Error} If the authentication provider cannot be built (no resource principal, unreadable config file) */
export async function createOciClients(config: AppConfig): Promise<OciClients> {
  const authenticationDetailsProvider = await createAuthProvider(config.auth);

  const objectStorage = new objectstorage.ObjectStorageClient({ authenticationDetailsProvider });
  const vision = new aivision.AIServiceVisionClient({ authenticationDetailsProvider });
  const functionsInvoke = new functions.FunctionsInvokeClient({ authenticationDetailsProvider });
  functionsInvoke.endpoint = config.documentGenerator.invokeEndpoint;

  logger.info({ authMode: config.auth.mode }, 'OCI clients created');
  return { objectStorage, vision, functionsInvoke };
}
