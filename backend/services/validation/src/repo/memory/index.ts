// backend/services/validation/src/repo/memory/index.ts
import type { ValidationRepos } from "../types";
import { systemClock, type Clock } from "../../utils/clock";
import { CycleMemoryRepo } from "./cycleMemoryRepo";
import { IssueMemoryRepo } from "./issueMemoryRepo";
import { RuleMemoryRepo } from "./ruleMemoryRepo";
import { ExceptionMemoryRepo } from "./exceptionMemoryRepo";
import { ScorecardMemoryRepo } from "./scorecardMemoryRepo";
import { MatrixMemoryRepo } from "./matrixMemoryRepo";

export function createMemoryRepos(now: Clock = systemClock): ValidationRepos {
  return {
    cycles: new CycleMemoryRepo(now),
    issues: new IssueMemoryRepo(),
    rules: new RuleMemoryRepo(now),
    exceptions: new ExceptionMemoryRepo(now),
    scorecards: new ScorecardMemoryRepo(now),
    matrix: new MatrixMemoryRepo(),
  };
}
