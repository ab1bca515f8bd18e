import type { WarmboxConfig } from '../../config/index.js';
import { getDockerClient } from '../docker-client.js';
import type { BackendDriver } from '../types.js';
import { DockerDriver } from './docker-driver.js';
import { KubernetesDriver, createKubernetesApi } from './kubernetes-driver.js';

export { DockerDriver, toCreateOptions, type DockerDriverOptions } from './docker-driver.js';
export {
  KubernetesDriver,
  createKubernetesApi,
  toPodManifest,
  toServiceManifest,
  toResourceName,
  type KubernetesCoreApi,
  type KubernetesDriverOptions,
} from './kubernetes-driver.js';

/**
 * Select the backend driver named by `config.backend`.
 */
export function createDriver(config: Pick<WarmboxConfig, 'backend' | 'dockerSocketPath' | 'kubernetes'>): BackendDriver {
  switch (config.backend) {
    case 'docker':
      return new DockerDriver({ client: getDockerClient(config.dockerSocketPath) });
    case 'k8s':
      return new KubernetesDriver({
        api: createKubernetesApi(config.kubernetes),
        namespace: config.kubernetes.namespace,
      });
  }
}
