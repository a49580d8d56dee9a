// backend/services/validation/src/mappers/validation.mapper.ts
/**
 * DB → domain mapping for every persisted validation entity.
 *
 * - Documents are read with `.lean()`, so inputs are plain objects.
 * - `_id` becomes `id`; everything else passes through the Zod contract so
 *   callers never see a malformed row.
 */

import { cycleContract, type ValidationCycle } from "../contracts/cycle.contract";
import { issueContract, type ValidationIssue } from "../contracts/issue.contract";
import { ruleContract, type ValidationRule } from "../contracts/rule.contract";
import {
  exceptionContract,
  type ValidationException,
} from "../contracts/exception.contract";
import {
  scorecardContract,
  type ValidationScorecard,
} from "../contracts/scorecard.contract";
import {
  matrixRowContract,
  type TraceabilityMatrixRow,
} from "../contracts/matrix.contract";
import type { ValidationCycleDoc } from "../models/ValidationCycle";
import type { ValidationIssueDoc } from "../models/ValidationIssue";
import type { ValidationRuleDoc } from "../models/ValidationRule";
import type { ValidationExceptionDoc } from "../models/ValidationException";
import type { ValidationScorecardDoc } from "../models/ValidationScorecard";
import type { TraceabilityMatrixDoc } from "../models/TraceabilityMatrix";

function withId<T extends { _id: string }>(
  doc: T
): Omit<T, "_id"> & { id: string } {
  const { _id, ...rest } = doc;
  return { ...rest, id: _id };
}

export const cycleToDomain = (doc: ValidationCycleDoc): ValidationCycle =>
  cycleContract.parse(withId(doc));

export const issueToDomain = (doc: ValidationIssueDoc): ValidationIssue =>
  issueContract.parse(withId(doc));

export const ruleToDomain = (doc: ValidationRuleDoc): ValidationRule =>
  ruleContract.parse(withId(doc));

export const exceptionToDomain = (
  doc: ValidationExceptionDoc
): ValidationException => exceptionContract.parse(withId(doc));

export const scorecardToDomain = (
  doc: ValidationScorecardDoc
): ValidationScorecard => scorecardContract.parse(withId(doc));

export const matrixRowToDomain = (
  doc: TraceabilityMatrixDoc
): TraceabilityMatrixRow => matrixRowContract.parse(withId(doc));
