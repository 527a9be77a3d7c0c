import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ComputeApi } from "./compute-api";
import { describeError } from "./errors";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export interface PreflightOptions {
  api: ComputeApi;
  homeRegion: string;
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
  homeDir?: string;
}

const CREDENTIAL_ENV_VARS = ["AWS_ACCESS_KEY_ID", "AWS_PROFILE", "AWS_WEB_IDENTITY_TOKEN_FILE", "AWS_CONTAINER_CREDENTIALS_FULL_URI"];

export async function runPreflight(options: PreflightOptions): Promise<PreflightReport> {
  const env = options.env ?? process.env;
  const checks: PreflightCheck[] = [];

  const nodeVersion = options.nodeVersion ?? process.versions.node;
  const nodeMajor = Number(nodeVersion.split(".")[0] ?? "0");
  const nodeOk = Number.isFinite(nodeMajor) && nodeMajor >= 20;
  checks.push({
    key: "node",
    ok: nodeOk,
    message: `Node.js v${nodeVersion}`,
    fix: nodeOk ? undefined : "Install Node.js 20 or newer."
  });

  const credentialSource = findCredentialSource(env, options.homeDir ?? os.homedir());
  checks.push({
    key: "credentials",
    ok: credentialSource !== null,
    message: credentialSource ? `AWS credentials from ${credentialSource}` : "No AWS credentials found.",
    fix: credentialSource ? undefined : "Configure credentials for the AWS SDK.",
    suggestedCommands: credentialSource ? undefined : ["aws configure", "aws sso login"]
  });

  try {
    const regions = await options.api.listRegions();
    checks.push({
      key: "regions",
      ok: regions.length > 0,
      message: regions.length > 0
        ? `Listed ${regions.length} region(s) via ${options.homeRegion}`
        : `No regions returned via ${options.homeRegion}`,
      fix: regions.length > 0 ? undefined : "Check that the account has EC2 regions enabled."
    });
  } catch (error) {
    checks.push({
      key: "regions",
      ok: false,
      message: `Could not list regions via ${options.homeRegion}: ${describeError(error)}`,
      fix: "Check network access and that the credentials allow ec2:DescribeRegions."
    });
  }

  return { checks, ok: checks.every((check) => check.ok) };
}

function findCredentialSource(env: NodeJS.ProcessEnv, homeDir: string): string | null {
  const fromEnv = CREDENTIAL_ENV_VARS.find((name) => Boolean(env[name]));
  if (fromEnv) {
    return fromEnv;
  }

  const files = [
    env.AWS_SHARED_CREDENTIALS_FILE ?? path.join(homeDir, ".aws", "credentials"),
    env.AWS_CONFIG_FILE ?? path.join(homeDir, ".aws", "config")
  ];
  return files.find((file) => fs.existsSync(file)) ?? null;
}
