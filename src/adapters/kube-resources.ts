/**
 * Schemas for the parts of Kubernetes objects cpc reads, plus readiness
 * helpers. Objects that do not match a schema are ignored by the typed
 * accessors.
 */

import { z } from 'zod';

export const kubeObjectSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: z
      .object({
        name: z.string(),
        namespace: z.string().optional(),
        labels: z.record(z.string()).optional(),
        annotations: z.record(z.string()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export type KubeObject = z.infer<typeof kubeObjectSchema>;

export const kubeListSchema = z.object({
  items: z.array(kubeObjectSchema),
});

const conditionSchema = z
  .object({
    type: z.string(),
    status: z.string().optional(),
  })
  .passthrough();

export const podSchema = kubeObjectSchema.extend({
  spec: z
    .object({
      nodeName: z.string().optional(),
      containers: z.array(z.object({ name: z.string(), image: z.string() }).passthrough()),
    })
    .passthrough(),
  status: z
    .object({
      phase: z.string().optional(),
      hostIP: z.string().optional(),
      containerStatuses: z
        .array(z.object({ name: z.string(), ready: z.boolean() }).passthrough())
        .optional(),
    })
    .passthrough()
    .default({}),
});

export type Pod = z.infer<typeof podSchema>;

export const nodeSchema = kubeObjectSchema.extend({
  status: z
    .object({
      conditions: z.array(conditionSchema).optional(),
      addresses: z.array(z.object({ type: z.string(), address: z.string() })).optional(),
    })
    .passthrough()
    .default({}),
});

export type KubeNode = z.infer<typeof nodeSchema>;

export const csrSchema = kubeObjectSchema.extend({
  spec: z.object({ signerName: z.string().optional() }).passthrough().default({}),
  status: z
    .object({ conditions: z.array(conditionSchema).optional() })
    .passthrough()
    .default({}),
});

export type CertificateSigningRequest = z.infer<typeof csrSchema>;

export const workloadSchema = kubeObjectSchema.extend({
  spec: z.object({ replicas: z.number().optional() }).passthrough().default({}),
  status: z
    .object({
      replicas: z.number().optional(),
      readyReplicas: z.number().optional(),
      desiredNumberScheduled: z.number().optional(),
      numberReady: z.number().optional(),
    })
    .passthrough()
    .default({}),
});

export type Workload = z.infer<typeof workloadSchema>;

const versionSchema = z.object({
  serverVersion: z.object({
    major: z.string(),
    minor: z.string(),
    gitVersion: z.string(),
  }),
});

export interface KubeVersion {
  major: number;
  minor: number;
  gitVersion: string;
}

function parseAll<S extends z.ZodTypeAny>(schema: S, objects: readonly unknown[]): z.output<S>[] {
  const parsed: z.output<S>[] = [];
  for (const object of objects) {
    const result = schema.safeParse(object);
    if (result.success) {
      parsed.push(result.data);
    }
  }
  return parsed;
}

export function asPods(objects: readonly KubeObject[]): Pod[] {
  return parseAll(podSchema, objects);
}

export function asNodes(objects: readonly KubeObject[]): KubeNode[] {
  return parseAll(nodeSchema, objects);
}

export function asCsrs(objects: readonly KubeObject[]): CertificateSigningRequest[] {
  return parseAll(csrSchema, objects);
}

export function asWorkloads(objects: readonly KubeObject[]): Workload[] {
  return parseAll(workloadSchema, objects);
}

export function parseServerVersion(raw: unknown): KubeVersion | null {
  const result = versionSchema.safeParse(raw);
  if (!result.success) {
    return null;
  }
  const { major, minor, gitVersion } = result.data.serverVersion;
  // Some distributions report minor versions like "28+"
  return {
    major: Number.parseInt(major, 10),
    minor: Number.parseInt(minor.replace(/\D+$/, ''), 10),
    gitVersion,
  };
}

export function isPodReady(pod: Pod): boolean {
  const statuses = pod.status.containerStatuses ?? [];
  return (
    pod.status.phase === 'Running' &&
    statuses.length > 0 &&
    statuses.every(status => status.ready)
  );
}

export function isNodeReady(node: KubeNode): boolean {
  return (node.status.conditions ?? []).some(
    condition => condition.type === 'Ready' && condition.status === 'True'
  );
}

export function isControlPlaneNode(node: KubeNode): boolean {
  const labels = node.metadata.labels ?? {};
  return (
    'node-role.kubernetes.io/control-plane' in labels ||
    'node-role.kubernetes.io/master' in labels
  );
}

export function isPendingCsr(csr: CertificateSigningRequest): boolean {
  return !(csr.status.conditions ?? []).some(condition =>
    ['Approved', 'Denied', 'Failed'].includes(condition.type)
  );
}

/**
 * True when a deployment or daemonset has all desired replicas ready.
 */
export function isWorkloadReady(workload: Workload): boolean {
  const { status } = workload;
  if (status.desiredNumberScheduled !== undefined) {
    return status.desiredNumberScheduled > 0 && (status.numberReady ?? 0) >= status.desiredNumberScheduled;
  }
  const desired = workload.spec.replicas ?? status.replicas ?? 1;
  return desired > 0 && (status.readyReplicas ?? 0) >= desired;
}

/**
 * Tag portion of a container image reference; "latest" when untagged.
 */
export function imageTag(image: string): string {
  const withoutDigest = image.split('@')[0] ?? image;
  const lastSlash = withoutDigest.lastIndexOf('/');
  const lastColon = withoutDigest.lastIndexOf(':');
  return lastColon > lastSlash ? withoutDigest.slice(lastColon + 1) : 'latest';
}

export function annotationSize(object: KubeObject, annotation: string): number {
  const value = object.metadata.annotations?.[annotation];
  return value === undefined ? 0 : Buffer.byteLength(value, 'utf8');
}
