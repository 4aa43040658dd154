import { globWorkspace } from "../../utils/fs.js";
import { invoke, notPresent, verdictOf } from "./verdict.js";
import type { Validator } from "./types.js";

// pytest: no tests were collected
const NO_TESTS_COLLECTED = 5;

export const pythonValidator: Validator = {
  name: "python",
  timeoutSeconds: 120,
  async validate(ctx) {
    const sources = await globWorkspace(ctx.workspace, "**/*.py", ctx.config.ignorePatterns);
    if (sources.length === 0) {
      return notPresent("Python");
    }

    const compiled = verdictOf(
      await invoke(ctx, "python3", ["-m", "py_compile", ...sources]),
      "Python compilation",
      `${String(sources.length)} Python file(s) compile`
    );
    if (!compiled.passed) {
      return compiled;
    }

    const tests = verdictOf(
      await invoke(ctx, "pytest", [ctx.workspace, "-q"]),
      "pytest",
      "Python tests pass",
      [NO_TESTS_COLLECTED]
    );
    return tests.passed ? { passed: true, message: `${compiled.message}; ${tests.message}` } : tests;
  },
};
