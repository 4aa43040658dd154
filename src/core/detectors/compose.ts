import { parse } from "yaml";

import { createFinding } from "../findings/finding.js";
import { findFirstFile, readWorkspaceFile } from "../../utils/fs.js";
import type { DetectionResult, Finding } from "../types/index.js";
import type { Detector } from "./types.js";

export const COMPOSE_FILES = [
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml",
] as const;

// Any key ending in "password": MYSQL_ROOT_PASSWORD, db_password, password.
const PASSWORD_ASSIGNMENT = /\b([A-Za-z0-9_]*PASSWORD)\b["']?\s*[:=]\s*(.*)$/i;

export interface HardcodedPassword {
  key: string;
  line: number;
}

/**
 * Lines that assign a literal to a password key. `${VAR}` interpolation and
 * empty values are not literals.
 */
export function findHardcodedPasswords(content: string): HardcodedPassword[] {
  const hits: HardcodedPassword[] = [];
  content.split(/\r?\n/).forEach((text, index) => {
    if (text.trimStart().startsWith("#")) return;
    const match = PASSWORD_ASSIGNMENT.exec(text);
    if (!match) return;
    const value = (match[2] ?? "").trim().replace(/^["']|["']$/g, "");
    if (value === "" || value.startsWith("${")) return;
    hits.push({ key: match[1] ?? "password", line: index + 1 });
  });
  return hits;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * An `image` key with an empty or null value does not count.
 */
export function declaresImage(image: unknown): boolean {
  return image !== undefined && image !== null && image !== "";
}

/**
 * Services that run an image but declare no health probe.
 */
export function servicesMissingHealthcheck(document: unknown): string[] {
  if (!isRecord(document) || !isRecord(document.services)) {
    return [];
  }
  return Object.entries(document.services)
    .filter(
      ([, service]) =>
        isRecord(service) && declaresImage(service.image) && !("healthcheck" in service)
    )
    .map(([name]) => name);
}

export interface ComposeDetails {
  file: string;
  parseError: string | null;
  servicesMissingHealthcheck: string[];
  missingResourceLimits: boolean;
  hardcodedPasswords: HardcodedPassword[];
}

function readDetails(result: DetectionResult): ComposeDetails {
  const d = result.details;
  return {
    file: typeof d.file === "string" ? d.file : COMPOSE_FILES[0],
    parseError: typeof d.parseError === "string" ? d.parseError : null,
    servicesMissingHealthcheck: Array.isArray(d.servicesMissingHealthcheck)
      ? d.servicesMissingHealthcheck.filter((s): s is string => typeof s === "string")
      : [],
    missingResourceLimits: d.missingResourceLimits === true,
    hardcodedPasswords: Array.isArray(d.hardcodedPasswords)
      ? d.hardcodedPasswords.filter(
          (p): p is HardcodedPassword =>
            isRecord(p) && typeof p.key === "string" && typeof p.line === "number"
        )
      : [],
  };
}

export const composeDetector: Detector = {
  name: "compose",
  timeoutSeconds: 10,
  async detect(ctx) {
    const file = await findFirstFile(ctx.workspace, COMPOSE_FILES);
    if (file === null) {
      return [];
    }
    const content = (await readWorkspaceFile(ctx.workspace, file)) ?? "";

    let document: unknown = null;
    let parseError: string | null = null;
    try {
      document = parse(content);
    } catch (error) {
      parseError = error instanceof Error ? error.message : String(error);
      ctx.reporter.warn(`${file} is not valid YAML; only the credential scan was run`);
    }

    const details: ComposeDetails = {
      file,
      parseError,
      servicesMissingHealthcheck: servicesMissingHealthcheck(document),
      missingResourceLimits: parseError === null && !/^\s*deploy\s*:/m.test(content),
      hardcodedPasswords: findHardcodedPasswords(content),
    };

    const count =
      (details.servicesMissingHealthcheck.length > 0 ? 1 : 0) +
      (details.missingResourceLimits ? 1 : 0) +
      (details.hardcodedPasswords.length > 0 ? 1 : 0);

    return [
      {
        category: "docker-compose",
        found: count > 0,
        count,
        details: { ...details },
        severity: details.hardcodedPasswords.length > 0 ? "high" : "medium",
      },
    ];
  },
  explain(result) {
    const details = readDetails(result);
    const findings: Finding[] = [];

    for (const hit of details.hardcodedPasswords) {
      findings.push(
        createFinding({
          category: "docker-compose",
          severity: "high",
          location: { path: details.file, line: hit.line },
          message: `Hardcoded credential in ${hit.key}; move it to an env file or secret`,
          fixable: false,
        })
      );
    }

    if (details.servicesMissingHealthcheck.length > 0) {
      findings.push(
        createFinding({
          category: "docker-compose",
          severity: "medium",
          location: { path: details.file, line: 0 },
          message: `Services without a healthcheck: ${details.servicesMissingHealthcheck.join(", ")}`,
          fixable: true,
          remedy: { kind: "action", action: "add-compose-healthchecks" },
        })
      );
    }

    if (details.missingResourceLimits) {
      findings.push(
        createFinding({
          category: "docker-compose",
          severity: "low",
          location: { path: details.file, line: 0 },
          message: "No service declares deploy resource limits",
          fixable: false,
        })
      );
    }

    return findings;
  },
};
