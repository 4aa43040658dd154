import { describe, it, expect } from "vitest";

import { ValidationChain } from "../../../core/validators/chain.js";
import type { Validator } from "../../../core/validators/types.js";
import { fakeRunner, RecordingReporter, testConfig } from "../../fixtures.js";

const context = { workspace: "/work", config: testConfig(), run: fakeRunner().run };

describe("ValidationChain", () => {
  it("runs every validator even after failures", async () => {
    const calls: string[] = [];
    const throwing: Validator = {
      name: "python",
      timeoutSeconds: 5,
      validate: () => {
        calls.push("python");
        return Promise.reject(new Error("interpreter crashed"));
      },
    };
    const hanging: Validator = {
      name: "docker-build",
      timeoutSeconds: 0.05,
      validate: () => {
        calls.push("docker-build");
        return new Promise(() => undefined);
      },
    };
    const passing: Validator = {
      name: "compose",
      timeoutSeconds: 5,
      validate: () => {
        calls.push("compose");
        return Promise.resolve({ passed: true, message: "compose.yml is valid" });
      },
    };
    const reporter = new RecordingReporter();

    const report = await new ValidationChain([throwing, hanging, passing]).validateAll(context, reporter);

    expect(calls).toEqual(["python", "docker-build", "compose"]);
    expect(report).toEqual({
      allPassed: false,
      records: [
        { validator: "python", passed: false, message: "interpreter crashed" },
        {
          validator: "docker-build",
          passed: false,
          message: "docker-build validator timed out after 0.05 seconds",
        },
        { validator: "compose", passed: true, message: "compose.yml is valid" },
      ],
    });
    expect(reporter.events).toEqual([
      "validationRecorded python fail",
      "validationRecorded docker-build fail",
      "validationRecorded compose pass",
    ]);
  });

  it("records a validator that throws synchronously and keeps going", async () => {
    const throwing: Validator = {
      name: "python",
      timeoutSeconds: 5,
      validate: () => {
        throw new Error("boom");
      },
    };
    const passing: Validator = {
      name: "javascript",
      timeoutSeconds: 5,
      validate: () => Promise.resolve({ passed: true, message: "npm test passed" }),
    };

    const report = await new ValidationChain([throwing, passing]).validateAll(context);

    expect(report).toEqual({
      allPassed: false,
      records: [
        { validator: "python", passed: false, message: "boom" },
        { validator: "javascript", passed: true, message: "npm test passed" },
      ],
    });
  });

  it("passes an empty chain", async () => {
    await expect(new ValidationChain([]).validateAll(context)).resolves.toEqual({
      allPassed: true,
      records: [],
    });
  });

  it("builds the chain from configured names in table order", () => {
    expect(ValidationChain.fromNames(["compose", "python"]).names).toEqual(["python", "compose"]);
  });

  it("caps each validator at the configured budget", async () => {
    const seen: number[] = [];
    const probe: Validator = {
      name: "javascript",
      timeoutSeconds: 120,
      validate: (ctx) => {
        seen.push(ctx.timeoutSeconds);
        return Promise.resolve({ passed: true, message: "npm test passed" });
      },
    };

    await new ValidationChain([probe]).validateAll({
      ...context,
      config: testConfig({ validation: { timeoutSeconds: 45 } }),
    });

    expect(seen).toEqual([45]);
  });
});
