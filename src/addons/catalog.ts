/**
 * Supported cluster addons, their default versions and how to install,
 * observe and wait for each of them.
 */

export const ADDON_NAMES = [
  'calico',
  'metallb',
  'metrics-server',
  'coredns',
  'cert-manager',
  'kubelet-serving-cert-approver',
  'argocd',
  'ingress-nginx',
] as const;

export type AddonName = (typeof ADDON_NAMES)[number];

export const ALL_ADDONS = 'all';

export type AddonSelection = AddonName | typeof ALL_ADDONS;

export function isAddonName(value: string): value is AddonName {
  return ADDON_NAMES.some(name => name === value);
}

export type AddonInstall =
  | {
      kind: 'manifests';
      manifests: (version: string) => string[];
      /** Namespace to create and apply into */
      namespace?: string;
    }
  | {
      kind: 'image';
      namespace: string;
      workload: string;
      container: string;
      image: (version: string) => string;
    };

export interface AddonWorkload {
  resource: 'deployment' | 'daemonset';
  name: string;
}

export interface AddonDefinition {
  name: AddonName;
  description: string;
  defaultVersion: string;
  /** Env-file key that pins the version per workspace */
  versionKey: string;
  namespace: string;
  /** Label selector for the pods whose image tag is the live version */
  podSelector: string;
  /** Container to read the image from; the first container when omitted */
  container?: string;
  workloads: AddonWorkload[];
  install: AddonInstall;
  /** CRDs whose last-applied annotation can outgrow the API write limit */
  crds?: string[];
}

export const LAST_APPLIED_ANNOTATION = 'kubectl.kubernetes.io/last-applied-configuration';

export const ADDON_CATALOG: Record<AddonName, AddonDefinition> = {
  calico: {
    name: 'calico',
    description: 'Calico networking via the Tigera operator',
    defaultVersion: 'v3.28.0',
    versionKey: 'CALICO_VERSION',
    namespace: 'calico-system',
    podSelector: 'k8s-app=calico-node',
    container: 'calico-node',
    workloads: [{ resource: 'daemonset', name: 'calico-node' }],
    install: {
      kind: 'manifests',
      manifests: version => [
        `https://raw.githubusercontent.com/projectcalico/calico/${version}/manifests/tigera-operator.yaml`,
        `https://raw.githubusercontent.com/projectcalico/calico/${version}/manifests/custom-resources.yaml`,
      ],
    },
    crds: [
      'installations.operator.tigera.io',
      'tigerastatuses.operator.tigera.io',
      'apiservers.operator.tigera.io',
      'imagesets.operator.tigera.io',
    ],
  },
  metallb: {
    name: 'metallb',
    description: 'MetalLB load balancer',
    defaultVersion: 'v0.14.8',
    versionKey: 'METALLB_VERSION',
    namespace: 'metallb-system',
    podSelector: 'app=metallb,component=controller',
    workloads: [
      { resource: 'deployment', name: 'controller' },
      { resource: 'daemonset', name: 'speaker' },
    ],
    install: {
      kind: 'manifests',
      manifests: version => [
        `https://raw.githubusercontent.com/metallb/metallb/${version}/config/manifests/metallb-native.yaml`,
      ],
    },
  },
  'metrics-server': {
    name: 'metrics-server',
    description: 'Kubernetes metrics server',
    defaultVersion: 'v0.7.2',
    versionKey: 'METRICS_SERVER_VERSION',
    namespace: 'kube-system',
    podSelector: 'k8s-app=metrics-server',
    workloads: [{ resource: 'deployment', name: 'metrics-server' }],
    install: {
      kind: 'manifests',
      manifests: version => [
        `https://github.com/kubernetes-sigs/metrics-server/releases/download/${version}/components.yaml`,
      ],
    },
  },
  coredns: {
    name: 'coredns',
    description: 'CoreDNS cluster DNS',
    defaultVersion: 'v1.11.3',
    versionKey: 'COREDNS_VERSION',
    namespace: 'kube-system',
    podSelector: 'k8s-app=kube-dns',
    container: 'coredns',
    workloads: [{ resource: 'deployment', name: 'coredns' }],
    install: {
      kind: 'image',
      namespace: 'kube-system',
      workload: 'deployment/coredns',
      container: 'coredns',
      image: version => `registry.k8s.io/coredns/coredns:${version}`,
    },
  },
  'cert-manager': {
    name: 'cert-manager',
    description: 'cert-manager certificate controller',
    defaultVersion: 'v1.16.2',
    versionKey: 'CERT_MANAGER_VERSION',
    namespace: 'cert-manager',
    podSelector: 'app.kubernetes.io/name=cert-manager',
    workloads: [
      { resource: 'deployment', name: 'cert-manager' },
      { resource: 'deployment', name: 'cert-manager-webhook' },
      { resource: 'deployment', name: 'cert-manager-cainjector' },
    ],
    install: {
      kind: 'manifests',
      manifests: version => [
        `https://github.com/cert-manager/cert-manager/releases/download/${version}/cert-manager.crds.yaml`,
        `https://github.com/cert-manager/cert-manager/releases/download/${version}/cert-manager.yaml`,
      ],
    },
  },
  'kubelet-serving-cert-approver': {
    name: 'kubelet-serving-cert-approver',
    description: 'Automatic approval of kubelet serving certificates',
    defaultVersion: 'v0.9.2',
    versionKey: 'KUBELET_SERVING_CERT_APPROVER_VERSION',
    namespace: 'kubelet-serving-cert-approver',
    podSelector: 'app.kubernetes.io/name=kubelet-serving-cert-approver',
    workloads: [{ resource: 'deployment', name: 'kubelet-serving-cert-approver' }],
    install: {
      kind: 'manifests',
      manifests: version => [
        `https://raw.githubusercontent.com/alex1989hu/kubelet-serving-cert-approver/${version}/deploy/standalone-install.yaml`,
      ],
    },
  },
  argocd: {
    name: 'argocd',
    description: 'Argo CD GitOps controller',
    defaultVersion: 'v2.13.2',
    versionKey: 'ARGOCD_VERSION',
    namespace: 'argocd',
    podSelector: 'app.kubernetes.io/name=argocd-server',
    workloads: [{ resource: 'deployment', name: 'argocd-server' }],
    install: {
      kind: 'manifests',
      namespace: 'argocd',
      manifests: version => [
        `https://raw.githubusercontent.com/argoproj/argo-cd/${version}/manifests/install.yaml`,
      ],
    },
  },
  'ingress-nginx': {
    name: 'ingress-nginx',
    description: 'NGINX ingress controller (bare-metal)',
    defaultVersion: 'v1.12.0',
    versionKey: 'INGRESS_NGINX_VERSION',
    namespace: 'ingress-nginx',
    podSelector: 'app.kubernetes.io/component=controller',
    container: 'controller',
    workloads: [{ resource: 'deployment', name: 'ingress-nginx-controller' }],
    install: {
      kind: 'manifests',
      manifests: version => [
        `https://raw.githubusercontent.com/kubernetes/ingress-nginx/controller-${version}/deploy/static/provider/baremetal/deploy.yaml`,
      ],
    },
  },
};

/**
 * Addons in the order `all` processes them.
 */
export function resolveSelection(selection: AddonSelection): AddonDefinition[] {
  if (selection === ALL_ADDONS) {
    return ADDON_NAMES.map(name => ADDON_CATALOG[name]);
  }
  return [ADDON_CATALOG[selection]];
}

/**
 * Compare versions ignoring a leading "v".
 */
export function sameVersion(a: string, b: string): boolean {
  return a.replace(/^v/, '') === b.replace(/^v/, '');
}
