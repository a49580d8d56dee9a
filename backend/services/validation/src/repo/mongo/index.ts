// backend/services/validation/src/repo/mongo/index.ts
import type { ValidationRepos } from "../types";
import { CycleMongoRepo } from "./cycleMongoRepo";
import { IssueMongoRepo } from "./issueMongoRepo";
import { RuleMongoRepo } from "./ruleMongoRepo";
import { ExceptionMongoRepo } from "./exceptionMongoRepo";
import { ScorecardMongoRepo } from "./scorecardMongoRepo";
import { MatrixMongoRepo } from "./matrixMongoRepo";

/** Requires an open mongoose connection (see db.ts). */
export function createMongoRepos(): ValidationRepos {
  return {
    cycles: new CycleMongoRepo(),
    issues: new IssueMongoRepo(),
    rules: new RuleMongoRepo(),
    exceptions: new ExceptionMongoRepo(),
    scorecards: new ScorecardMongoRepo(),
    matrix: new MatrixMongoRepo(),
  };
}
