/**
 * Swarm service specification types.
 *
 * Field names follow the Engine API wire format (PascalCase), so a spec can be
 * serialized as-is into the request body.
 */

/**
 * Platform a task is allowed to run on.
 */
export interface Platform {
  /** CPU architecture (x86_64, aarch64, ...) */
  Architecture: string;
  /** Operating system (linux, windows) */
  OS: string;
}

/**
 * Spread preference for task placement.
 */
export interface PlacementPreference {
  Spread?: {
    SpreadDescriptor: string;
  };
}

/**
 * Constraints limiting which nodes may run a task.
 */
export interface Placement {
  /** Node constraint expressions (e.g. "node.role==manager") */
  Constraints?: string[];
  Preferences?: PlacementPreference[];
  /** Maximum replicas per node, 0 for unlimited */
  MaxReplicas?: number;
  /** Platforms the image supports */
  Platforms?: Platform[];
}

export interface Mount {
  Type: 'bind' | 'volume' | 'tmpfs' | 'npipe';
  Source?: string;
  Target: string;
  ReadOnly?: boolean;
}

/**
 * Container created for each task.
 */
export interface ContainerSpec {
  /** Image reference, optionally pinned by digest */
  Image: string;
  Labels?: Record<string, string>;
  Command?: string[];
  Args?: string[];
  Hostname?: string;
  Env?: string[];
  Dir?: string;
  User?: string;
  Mounts?: Mount[];
  StopGracePeriod?: number;
  [field: string]: unknown;
}

export interface ResourceRequirements {
  Limits?: { NanoCPUs?: number; MemoryBytes?: number };
  Reservations?: { NanoCPUs?: number; MemoryBytes?: number };
}

export interface RestartPolicy {
  Condition?: 'none' | 'on-failure' | 'any';
  Delay?: number;
  MaxAttempts?: number;
  Window?: number;
}

/**
 * Template for the tasks of a service.
 */
export interface TaskSpec {
  ContainerSpec: ContainerSpec;
  Resources?: ResourceRequirements;
  RestartPolicy?: RestartPolicy;
  Placement?: Placement;
  Networks?: Array<{ Target: string; Aliases?: string[] }>;
  ForceUpdate?: number;
  Runtime?: string;
}

export type ServiceMode =
  | { Replicated: { Replicas?: number } }
  | { Global: Record<string, never> };

export interface UpdateConfig {
  Parallelism?: number;
  Delay?: number;
  FailureAction?: 'continue' | 'pause' | 'rollback';
  Monitor?: number;
  MaxFailureRatio?: number;
  Order?: 'stop-first' | 'start-first';
}

export interface PortConfig {
  Name?: string;
  Protocol?: 'tcp' | 'udp' | 'sctp';
  TargetPort?: number;
  PublishedPort?: number;
  PublishMode?: 'ingress' | 'host';
}

export interface EndpointSpec {
  Mode?: 'vip' | 'dnsrr';
  Ports?: PortConfig[];
}

/**
 * User-modifiable configuration of a swarm service.
 */
export interface ServiceSpec {
  Name?: string;
  Labels?: Record<string, string>;
  TaskTemplate: TaskSpec;
  Mode?: ServiceMode;
  UpdateConfig?: UpdateConfig;
  RollbackConfig?: UpdateConfig;
  EndpointSpec?: EndpointSpec;
}
