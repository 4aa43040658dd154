import { emptyOutcome, sortBySeverity } from "../findings/finding.js";
import type { Fixer } from "./types.js";

/**
 * Security issues need a human; nothing in the workspace is changed.
 */
export const securityTriageFixer: Fixer = {
  name: "security-triage",
  categories: ["security"],
  apply(findings) {
    const outcome = emptyOutcome();
    outcome.manualReview.push(...sortBySeverity(findings));
    return Promise.resolve(outcome);
  },
};
