/**
 * Kubernetes Backend Driver
 *
 * Runs each sandbox as a Pod, exposed on the reserved port through a
 * NodePort Service. Pods start on creation; `stop` deletes the Pod and a
 * later `start` recreates it from the manifest this driver created it with.
 */

import { CoreV1Api, KubeConfig, type V1Pod, type V1Service } from '@kubernetes/client-node';
import type { KubernetesConfig } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { statusCodeOf } from '../docker-client.js';
import type { BackendDriver, ContainerSpec, DriverHandle } from '../types.js';

const logger = createLogger('sandbox:k8s-driver');

/** Label the Service selects its Pod by */
const SELECTOR_LABEL = 'warmbox.pod';

/**
 * The CoreV1 calls this driver makes.
 */
export type KubernetesCoreApi = Pick<
  CoreV1Api,
  | 'createNamespacedPod'
  | 'createNamespacedService'
  | 'readNamespacedPod'
  | 'deleteNamespacedPod'
  | 'deleteNamespacedService'
  | 'listNamespacedPod'
>;

export interface KubernetesDriverOptions {
  api: KubernetesCoreApi;
  namespace: string;
  /** How long `create` waits for the Pod to reach Running */
  readyTimeoutMs?: number;
  pollIntervalMs?: number;
}

/**
 * Build a CoreV1 client from a kubeconfig path, or from the default
 * lookup (KUBECONFIG, ~/.kube/config, in-cluster service account).
 */
export function createKubernetesApi(config: KubernetesConfig): CoreV1Api {
  const kubeConfig = new KubeConfig();
  if (config.kubeconfigPath) {
    kubeConfig.loadFromFile(config.kubeconfigPath);
  } else {
    kubeConfig.loadFromDefault();
  }
  return kubeConfig.makeApiClient(CoreV1Api);
}

/**
 * Pod names must be DNS-1123 labels.
 */
export function toResourceName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9-]/g, '-').replace(/^-+|-+$/g, '').slice(0, 63);
}

export function toPodManifest(spec: ContainerSpec, podName: string): V1Pod {
  const limits: Record<string, string> = {};
  if (spec.resourceLimits?.memoryMB !== undefined) {
    limits['memory'] = `${spec.resourceLimits.memoryMB}Mi`;
  }
  if (spec.resourceLimits?.cpuCount !== undefined) {
    limits['cpu'] = String(spec.resourceLimits.cpuCount);
  }

  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      name: podName,
      labels: { ...spec.labels, [SELECTOR_LABEL]: podName },
    },
    spec: {
      restartPolicy: 'Never',
      containers: [
        {
          name: 'sandbox',
          image: spec.image,
          env: Object.entries(spec.env).map(([name, value]) => ({ name, value })),
          ports: [{ containerPort: spec.containerPort, protocol: 'TCP' }],
          volumeMounts: spec.mounts.map((mount, index) => ({
            name: `mount-${index}`,
            mountPath: mount.containerPath,
            readOnly: mount.readOnly,
          })),
          resources: { limits },
          securityContext: {
            allowPrivilegeEscalation: spec.securityLevel === 'low',
            ...(spec.securityLevel === 'high' && { capabilities: { drop: ['ALL'] } }),
          },
        },
      ],
      volumes: spec.mounts.map((mount, index) => ({
        name: `mount-${index}`,
        hostPath: { path: mount.hostPath, type: 'DirectoryOrCreate' },
      })),
    },
  };
}

export function toServiceManifest(spec: ContainerSpec, podName: string): V1Service {
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: { name: podName, labels: spec.labels },
    spec: {
      type: 'NodePort',
      selector: { [SELECTOR_LABEL]: podName },
      ports: [
        {
          port: spec.containerPort,
          targetPort: spec.containerPort,
          nodePort: spec.hostPort,
          protocol: 'TCP',
        },
      ],
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class KubernetesDriver implements BackendDriver {
  readonly name = 'k8s';
  private readonly api: KubernetesCoreApi;
  private readonly namespace: string;
  private readonly readyTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly manifests = new Map<string, V1Pod>();

  constructor(options: KubernetesDriverOptions) {
    this.api = options.api;
    this.namespace = options.namespace;
    this.readyTimeoutMs = options.readyTimeoutMs ?? 120_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.api.listNamespacedPod(this.namespace);
      return true;
    } catch (error) {
      logger.debug({ err: error, namespace: this.namespace }, 'Kubernetes API not available');
      return false;
    }
  }

  async create(spec: ContainerSpec): Promise<DriverHandle> {
    const podName = toResourceName(spec.name);
    const pod = toPodManifest(spec, podName);

    await this.api.createNamespacedPod(this.namespace, pod);
    this.manifests.set(podName, pod);

    try {
      await this.api.createNamespacedService(this.namespace, toServiceManifest(spec, podName));
      const host = await this.waitForRunning(podName);
      logger.debug({ podName, host, nodePort: spec.hostPort }, 'Sandbox pod running');
      return { containerId: podName, host };
    } catch (error) {
      await this.destroy({ containerId: podName, host: '' });
      throw error;
    }
  }

  async start(handle: DriverHandle): Promise<void> {
    if (await this.podExists(handle.containerId)) {
      return;
    }

    const manifest = this.manifests.get(handle.containerId);
    if (!manifest) {
      throw new Error(`No manifest recorded for pod ${handle.containerId}`);
    }

    await this.api.createNamespacedPod(this.namespace, manifest);
    await this.waitForRunning(handle.containerId);
  }

  async stop(handle: DriverHandle): Promise<void> {
    await this.deletePod(handle.containerId);
    await this.waitForDeletion(handle.containerId);
  }

  async destroy(handle: DriverHandle): Promise<void> {
    await this.deletePod(handle.containerId);
    await this.ignoreNotFound(() => this.api.deleteNamespacedService(handle.containerId, this.namespace));
    this.manifests.delete(handle.containerId);
  }

  async isAlive(handle: DriverHandle): Promise<boolean> {
    try {
      const { body } = await this.api.readNamespacedPod(handle.containerId, this.namespace);
      return body.status?.phase === 'Running';
    } catch (error) {
      logger.debug({ err: error, podName: handle.containerId }, 'Pod read failed');
      return false;
    }
  }

  private async podExists(podName: string): Promise<boolean> {
    try {
      await this.api.readNamespacedPod(podName, this.namespace);
      return true;
    } catch (error) {
      if (statusCodeOf(error) === 404) {
        return false;
      }
      throw error;
    }
  }

  private async deletePod(podName: string): Promise<void> {
    await this.ignoreNotFound(() => this.api.deleteNamespacedPod(podName, this.namespace));
  }

  private async ignoreNotFound(call: () => Promise<unknown>): Promise<void> {
    try {
      await call();
    } catch (error) {
      if (statusCodeOf(error) !== 404) {
        throw error;
      }
    }
  }

  /**
   * Poll until the Pod is Running and return the node IP it landed on.
   */
  private async waitForRunning(podName: string): Promise<string> {
    const deadline = Date.now() + this.readyTimeoutMs;

    while (Date.now() < deadline) {
      const { body } = await this.api.readNamespacedPod(podName, this.namespace);
      const phase = body.status?.phase;

      if (phase === 'Running') {
        return body.status?.hostIP ?? 'localhost';
      }
      if (phase === 'Failed' || phase === 'Succeeded') {
        throw new Error(`Pod ${podName} terminated with phase ${phase}`);
      }

      await sleep(this.pollIntervalMs);
    }

    throw new Error(`Pod ${podName} not running after ${this.readyTimeoutMs}ms`);
  }

  private async waitForDeletion(podName: string): Promise<void> {
    const deadline = Date.now() + this.readyTimeoutMs;
    while (Date.now() < deadline) {
      if (!(await this.podExists(podName))) {
        return;
      }
      await sleep(this.pollIntervalMs);
    }
    throw new Error(`Pod ${podName} still present after ${this.readyTimeoutMs}ms`);
  }
}
