// EC2 implementation of ComputeApi over the AWS SDK v3.
//
// EC2 is a regional service, so one client is kept per region for the whole
// session. Credentials come from the SDK's default provider chain.

import {
  DescribeInstanceStatusCommand,
  DescribeInstancesCommand,
  DescribeRegionsCommand,
  EC2Client,
  RebootInstancesCommand,
  StartInstancesCommand,
  StopInstancesCommand,
  type Instance as Ec2Instance
} from "@aws-sdk/client-ec2";
import type { ComputeApi, RemoteInstancePage, RemoteInstanceRecord, RemoteRegion, RemoteTag } from "./compute-api";
import { DESCRIBE_PAGE_SIZE } from "./constants";
import { ActionError, AuthError, FleetError, NetworkError, describeError } from "./errors";
import type { StatusChecks } from "./types";
import { isRecord } from "./utils";

export type Ec2ClientFactory = (region: string) => EC2Client;

export interface Ec2ComputeApiOptions {
  homeRegion: string;
  clientFactory?: Ec2ClientFactory;
}

export type Ec2Operation = "read" | "action";

const AUTH_ERROR_CODES = new Set([
  "AuthFailure",
  "InvalidClientTokenId",
  "UnrecognizedClientException",
  "SignatureDoesNotMatch",
  "ExpiredToken",
  "ExpiredTokenException",
  "RequestExpired",
  "CredentialsProviderError"
]);

/** SDK v3 surfaces the code on `.name`; some shapes use `.Code` or `.code`. */
export function getAwsErrorCode(error: unknown): string {
  if (isRecord(error)) {
    for (const field of ["name", "Code", "code"]) {
      const value = error[field];
      if (typeof value === "string" && value) {
        return value;
      }
    }
  }
  return "Unknown";
}

export function mapEc2Error(error: unknown, operation: Ec2Operation): FleetError {
  if (error instanceof FleetError) {
    return error;
  }

  const code = getAwsErrorCode(error);
  const message = describeError(error);
  if (AUTH_ERROR_CODES.has(code)) {
    return new AuthError(message, { cause: error });
  }

  if (operation === "read") {
    return new NetworkError(`${code}: ${message}`, { cause: error });
  }

  switch (code) {
    case "UnauthorizedOperation":
      return new ActionError(`permission denied: ${message}`, { cause: error });
    case "IncorrectInstanceState":
      return new ActionError(`illegal transition: ${message}`, { cause: error });
    case "InvalidInstanceID.NotFound":
    case "InvalidInstanceID.Malformed":
      return new ActionError(`instance not found: ${message}`, { cause: error });
    default:
      return new ActionError(message, { cause: error });
  }
}

export async function withEc2Errors<T>(operation: Ec2Operation, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw mapEc2Error(error, operation);
  }
}

/** Actions are never retried by the SDK; a retry is a new request from the user. */
export function createEc2Client(region: string): EC2Client {
  return new EC2Client({ region, maxAttempts: 1 });
}

export class Ec2ComputeApi implements ComputeApi {
  private readonly clients = new Map<string, EC2Client>();
  private readonly homeRegion: string;
  private readonly clientFactory: Ec2ClientFactory;

  constructor(options: Ec2ComputeApiOptions) {
    this.homeRegion = options.homeRegion;
    this.clientFactory = options.clientFactory ?? createEc2Client;
  }

  async listRegions(): Promise<RemoteRegion[]> {
    const client = this.getClient(this.homeRegion);
    const result = await withEc2Errors("read", () => client.send(new DescribeRegionsCommand({})));
    return (result.Regions ?? []).flatMap((region) => (region.RegionName
      ? [{ code: region.RegionName }]
      : []));
  }

  async describeInstancesPage(region: string, nextToken?: string, signal?: AbortSignal): Promise<RemoteInstancePage> {
    const client = this.getClient(region);
    const result = await withEc2Errors("read", () => client.send(new DescribeInstancesCommand({
      MaxResults: DESCRIBE_PAGE_SIZE,
      NextToken: nextToken
    }), { abortSignal: signal }));
    const instances = (result.Reservations ?? []).flatMap((reservation) =>
      (reservation.Instances ?? []).flatMap((instance) => {
        const record = toRemoteRecord(instance);
        return record ? [record] : [];
      })
    );
    return { instances, nextToken: result.NextToken || undefined };
  }

  async startInstance(region: string, instanceId: string): Promise<void> {
    const client = this.getClient(region);
    await withEc2Errors("action", () => client.send(new StartInstancesCommand({ InstanceIds: [instanceId] })));
  }

  async stopInstance(region: string, instanceId: string): Promise<void> {
    const client = this.getClient(region);
    await withEc2Errors("action", () => client.send(new StopInstancesCommand({ InstanceIds: [instanceId] })));
  }

  async rebootInstance(region: string, instanceId: string): Promise<void> {
    const client = this.getClient(region);
    await withEc2Errors("action", () => client.send(new RebootInstancesCommand({ InstanceIds: [instanceId] })));
  }

  async describeInstanceStatus(region: string, instanceId: string): Promise<StatusChecks> {
    const client = this.getClient(region);
    const result = await withEc2Errors("read", () => client.send(new DescribeInstanceStatusCommand({
      InstanceIds: [instanceId],
      IncludeAllInstances: true
    })));
    const status = result.InstanceStatuses?.[0];
    return {
      instanceState: status?.InstanceState?.Name ?? "unknown",
      systemStatus: status?.SystemStatus?.Status ?? "unknown",
      instanceStatus: status?.InstanceStatus?.Status ?? "unknown"
    };
  }

  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }

  private getClient(region: string): EC2Client {
    const existing = this.clients.get(region);
    if (existing) {
      return existing;
    }
    const client = this.clientFactory(region);
    this.clients.set(region, client);
    return client;
  }
}

export function toRemoteRecord(instance: Ec2Instance): RemoteInstanceRecord | null {
  if (!instance.InstanceId) {
    return null;
  }
  const tags: RemoteTag[] = (instance.Tags ?? []).flatMap((tag) => (tag.Key !== undefined
    ? [{ key: tag.Key, value: tag.Value ?? "" }]
    : []));
  return {
    instanceId: instance.InstanceId,
    instanceType: instance.InstanceType,
    state: instance.State?.Name,
    tags,
    publicIpAddress: instance.PublicIpAddress,
    privateIpAddress: instance.PrivateIpAddress,
    launchTime: instance.LaunchTime
  };
}
