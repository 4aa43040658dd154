import { join } from "path";

import { createFinding } from "../findings/finding.js";
import { fileExists, readWorkspaceFile } from "../../utils/fs.js";
import type { DetectionResult, Finding } from "../types/index.js";
import type { Detector } from "./types.js";

export interface DockerfileDetails {
  dockerignore: boolean;
  multiStage: boolean;
  nonRootUser: boolean;
}

export function inspectDockerfile(content: string): Omit<DockerfileDetails, "dockerignore"> {
  const stages = content.match(/^\s*FROM\s+/gim) ?? [];
  const users = [...content.matchAll(/^\s*USER\s+(\S+)/gim)].map((m) => m[1] ?? "");
  // USER takes name[:group]; only the user part decides.
  const lastUser = users[users.length - 1]?.split(":")[0];
  return {
    multiStage: stages.length > 1,
    nonRootUser: lastUser !== undefined && lastUser !== "" && !/^(root|0+)$/.test(lastUser),
  };
}

function readDetails(result: DetectionResult): DockerfileDetails {
  return {
    dockerignore: result.details.dockerignore === true,
    multiStage: result.details.multiStage === true,
    nonRootUser: result.details.nonRootUser === true,
  };
}

export const dockerDetector: Detector = {
  name: "docker",
  timeoutSeconds: 10,
  async detect(ctx) {
    const content = await readWorkspaceFile(ctx.workspace, "Dockerfile");
    if (content === null) {
      return [];
    }

    const details: DockerfileDetails = {
      dockerignore: await fileExists(join(ctx.workspace, ".dockerignore")),
      ...inspectDockerfile(content),
    };
    const missing = Object.values(details).filter((ok) => !ok).length;

    return [
      {
        category: "docker",
        found: missing > 0,
        count: missing,
        details: { ...details },
        severity: "medium",
      },
    ];
  },
  explain(result) {
    const details = readDetails(result);
    const findings: Finding[] = [];

    if (!details.dockerignore) {
      findings.push(
        createFinding({
          category: "docker",
          severity: "medium",
          location: { path: ".dockerignore", line: 0 },
          message: "Build context has no .dockerignore; the whole workspace is sent to the daemon",
          fixable: true,
          remedy: { kind: "action", action: "create-dockerignore" },
        })
      );
    }
    if (!details.nonRootUser) {
      findings.push(
        createFinding({
          category: "docker",
          severity: "medium",
          location: { path: "Dockerfile", line: 0 },
          message: "Container runs as root; no non-root USER instruction",
          fixable: false,
        })
      );
    }
    if (!details.multiStage) {
      findings.push(
        createFinding({
          category: "docker",
          severity: "low",
          location: { path: "Dockerfile", line: 0 },
          message: "Dockerfile uses a single build stage",
          fixable: false,
        })
      );
    }

    return findings;
  },
};
