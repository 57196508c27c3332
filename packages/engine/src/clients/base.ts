/**
 * Base gRPC client with proto loading and connection management
 */

import { existsSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';

import { EngineError, EngineProcessError, EngineUnavailableError, mapGrpcError } from '../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Configuration for gRPC client connections
 */
export interface ClientConfig {
  /** Host to connect to */
  host: string;
  /** Port to connect to */
  port: number;
  /** Timeout in milliseconds for RPC calls */
  timeoutMs?: number;
  /** Directory holding the .proto files (default: the package's protos/) */
  protoRoot?: string;
}

/**
 * Proto loader options for proper camelCase handling
 */
const PROTO_LOADER_OPTIONS: protoLoader.Options = {
  keepCase: false, // Convert snake_case to camelCase
  longs: Number,
  enums: String,
  defaults: true,
  oneofs: true,
};

/**
 * Cache for loaded proto definitions
 */
const protoCache = new Map<string, grpc.GrpcObject>();

type ServiceClient = InstanceType<grpc.ServiceClientConstructor>;

/**
 * Locate the package's protos/ directory from sources or from dist/
 */
export function defaultProtoRoot(): string {
  const candidates = [
    // packages/engine/src/clients/ -> packages/engine/protos
    path.resolve(__dirname, '../../protos'),
    // dist/packages/engine/src/clients/ -> packages/engine/protos
    path.resolve(__dirname, '../../../../../packages/engine/protos'),
  ];
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0] ?? '';
}

function isNamespace(value: unknown): value is grpc.GrpcObject {
  return typeof value === 'object' && value !== null && !('format' in value);
}

function isServiceConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value;
}

/**
 * Base class for gRPC clients with common functionality
 */
export abstract class BaseGrpcClient {
  protected client: ServiceClient | null = null;
  protected readonly config: Required<ClientConfig>;
  private connectionPromise: Promise<ServiceClient> | null = null;

  constructor(config: ClientConfig) {
    this.config = {
      host: config.host,
      port: config.port,
      timeoutMs: config.timeoutMs ?? 30000,
      protoRoot: config.protoRoot ?? defaultProtoRoot(),
    };
  }

  /**
   * Get the path to the proto file
   */
  protected abstract getProtoPath(): string;

  /**
   * Get the service name within the proto
   */
  protected abstract getServiceName(): string;

  /**
   * Get the package name for the service
   */
  protected abstract getPackageName(): string;

  /**
   * Load proto definition and cache it
   */
  protected async loadProto(): Promise<grpc.GrpcObject> {
    const fullProtoPath = path.join(this.config.protoRoot, this.getProtoPath());

    const cached = protoCache.get(fullProtoPath);
    if (cached) {
      return cached;
    }

    const packageDefinition = await protoLoader.load(fullProtoPath, {
      ...PROTO_LOADER_OPTIONS,
      includeDirs: [this.config.protoRoot],
    });

    const proto = grpc.loadPackageDefinition(packageDefinition);
    protoCache.set(fullProtoPath, proto);
    return proto;
  }

  /**
   * Navigate to the service constructor in the proto object
   */
  protected getServiceConstructor(proto: grpc.GrpcObject): grpc.ServiceClientConstructor {
    let current: grpc.GrpcObject = proto;

    for (const part of this.getPackageName().split('.')) {
      const next = current[part];
      if (!isNamespace(next)) {
        throw new EngineProcessError(`Package '${this.getPackageName()}' not found in proto`);
      }
      current = next;
    }

    const ServiceConstructor = current[this.getServiceName()];
    if (!isServiceConstructor(ServiceConstructor)) {
      throw new EngineProcessError(
        `Service '${this.getServiceName()}' not found in package '${this.getPackageName()}'`,
      );
    }

    return ServiceConstructor;
  }

  /**
   * Ensure connection is established (lazy initialization)
   */
  protected async ensureConnected(): Promise<ServiceClient> {
    if (this.client) {
      return this.client;
    }

    // Prevent multiple simultaneous connection attempts
    if (this.connectionPromise) {
      return this.connectionPromise;
    }

    this.connectionPromise = this.connect();

    try {
      this.client = await this.connectionPromise;
      return this.client;
    } finally {
      this.connectionPromise = null;
    }
  }

  /**
   * Establish connection to the gRPC service
   */
  private async connect(): Promise<ServiceClient> {
    try {
      const proto = await this.loadProto();
      const ServiceConstructor = this.getServiceConstructor(proto);

      return new ServiceConstructor(this.address, grpc.credentials.createInsecure());
    } catch (err) {
      if (err instanceof EngineError) {
        throw err;
      }
      throw new EngineUnavailableError(
        this.address,
        err instanceof Error ? err : new Error(String(err)),
      );
    }
  }

  /**
   * Make a unary RPC call with proper error handling and deadline
   *
   * @param timeoutMs - Deadline for this call (default: the client's timeout)
   */
  protected async unaryCall<TRequest, TResponse>(
    method: string,
    request: TRequest,
    timeoutMs: number = this.config.timeoutMs,
  ): Promise<TResponse> {
    const client = await this.ensureConnected();

    const deadline = new Date(Date.now() + timeoutMs);

    return new Promise((resolve, reject) => {
      const methodFn = client[method];

      if (typeof methodFn !== 'function') {
        reject(new EngineProcessError(`Method '${method}' not found on service`));
        return;
      }

      methodFn.call(
        client,
        request,
        new grpc.Metadata(),
        { deadline },
        (err: grpc.ServiceError | null, response: TResponse) => {
          if (err) {
            reject(mapGrpcError(err.code, err.message, err.details));
          } else {
            resolve(response);
          }
        },
      );
    });
  }

  /**
   * Close the connection
   */
  public close(): void {
    if (this.client) {
      this.client.close();
      this.client = null;
    }
  }

  /**
   * Get the server address
   */
  public get address(): string {
    return `${this.config.host}:${this.config.port}`;
  }
}
