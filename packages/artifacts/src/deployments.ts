import type { MissingArtifactPolicy } from "@stackgate/core";
import type { ExtractionPlan } from "./extractor.js";

export const DEFAULT_NETWORK = "katana";

/** Flattened environment file at the store root. */
export const DEPLOYMENTS_ENV_FILE = ".env";

export function deploymentsManifestPath(network: string): string {
  return `${network}/deployments.json`;
}

export function declarationsPath(network: string): string {
  return `${network}/declarations.json`;
}

export interface DeploymentsPlanOptions {
  network?: string;
  output?: string;
  onMissingArtifact?: MissingArtifactPolicy;
}

/**
 * Extraction plan for the contract deployer's output: the deployed
 * Kakarot address and deployer account from the deployment manifest,
 * and the two account class hashes from the declarations document.
 */
export function createDeploymentsPlan(
  options: DeploymentsPlanOptions = {},
): ExtractionPlan {
  const network = options.network ?? DEFAULT_NETWORK;
  const manifest = deploymentsManifestPath(network);
  const declarations = declarationsPath(network);
  return {
    output: options.output ?? DEPLOYMENTS_ENV_FILE,
    onMissingArtifact: options.onMissingArtifact ?? "null",
    fields: [
      { key: "KAKAROT_ADDRESS", artifact: manifest, field: ".kakarot.address" },
      {
        key: "DEPLOYER_ACCOUNT_ADDRESS",
        artifact: manifest,
        field: ".deployer_account.address",
      },
      {
        key: "UNINITIALIZED_ACCOUNT_CLASS_HASH",
        artifact: declarations,
        field: ".uninitialized_account",
      },
      {
        key: "ACCOUNT_CONTRACT_CLASS_HASH",
        artifact: declarations,
        field: ".account_contract",
      },
    ],
  };
}
