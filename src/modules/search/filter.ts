import { z } from "zod";
import type { IndexCondition, IndexFilter } from "../../clients/vector-index.js";
import { InvalidSearchRequestError, type InvalidRequestIssue } from "./errors.js";
import type { FilterExpression, MetadataValue } from "./types.js";

type RawFieldCondition = {
  key: string;
  match: { value: MetadataValue };
};

type RawFilter = {
  must?: RawCondition[];
  should?: RawCondition[];
};

type RawCondition = RawFieldCondition | RawFilter;

const metadataValueSchema = z.union([z.string(), z.number().finite(), z.boolean()], {
  errorMap: () => ({ message: "filter values must be a string, a finite number or a boolean" })
});

const fieldConditionSchema = z
  .object({
    key: z.string().trim().min(1, "filter keys must be non-empty"),
    match: z.object({ value: metadataValueSchema }).strict()
  })
  .strict();

const rawFilterSchema: z.ZodType<RawFilter> = z.lazy(() =>
  z
    .object({
      must: z.array(conditionSchema).optional(),
      should: z.array(conditionSchema).optional()
    })
    .strict()
);

const conditionSchema: z.ZodType<RawCondition> = z.lazy(() => z.union([fieldConditionSchema, rawFilterSchema]));

export const MATCH_ALL: FilterExpression = { kind: "match_all" };

const isFieldCondition = (condition: RawCondition): condition is RawFieldCondition => "key" in condition;

const toExpression = (
  filter: RawFilter,
  path: Array<string | number>,
  knownFields: ReadonlySet<string>,
  issues: InvalidRequestIssue[]
): FilterExpression => {
  const convert = (condition: RawCondition, conditionPath: Array<string | number>): FilterExpression => {
    if (isFieldCondition(condition)) {
      if (!knownFields.has(condition.key)) {
        issues.push({
          path: [...conditionPath, "key"],
          message: `unknown filter field "${condition.key}"`
        });
      }
      return { kind: "equals", key: condition.key, value: condition.match.value };
    }
    return toExpression(condition, conditionPath, knownFields, issues);
  };

  const must = (filter.must ?? []).map((condition, index) => convert(condition, [...path, "must", index]));
  const should = (filter.should ?? []).map((condition, index) => convert(condition, [...path, "should", index]));

  const clauses: FilterExpression[] = [...must];
  if (should.length > 0) {
    clauses.push(should.length === 1 ? should[0] : { kind: "or", clauses: should });
  }

  if (clauses.length === 0) {
    return MATCH_ALL;
  }
  return clauses.length === 1 ? clauses[0] : { kind: "and", clauses };
};

/**
 * Parses a `{ must, should }` filter body into a {@link FilterExpression}.
 * Keys must belong to `knownFields`; values must be scalars. An absent or
 * empty filter matches everything.
 */
export const parseFilter = (raw: unknown, knownFields: readonly string[]): FilterExpression => {
  if (raw === undefined || raw === null) {
    return MATCH_ALL;
  }

  const parsed = rawFilterSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSearchRequestError(
      parsed.error.issues.map((issue) => ({
        path: ["filter", ...issue.path],
        message: issue.message
      }))
    );
  }

  const issues: InvalidRequestIssue[] = [];
  const expression = toExpression(parsed.data, ["filter"], new Set(knownFields), issues);
  if (issues.length > 0) {
    throw new InvalidSearchRequestError(issues);
  }
  return expression;
};

export const matchesFilter = (metadata: Record<string, unknown>, expression: FilterExpression): boolean => {
  switch (expression.kind) {
    case "match_all":
      return true;
    case "equals":
      return metadata[expression.key] === expression.value;
    case "and":
      return expression.clauses.every((clause) => matchesFilter(metadata, clause));
    case "or":
      return expression.clauses.some((clause) => matchesFilter(metadata, clause));
  }
};

const toCondition = (expression: Exclude<FilterExpression, { kind: "match_all" }>): IndexCondition => {
  switch (expression.kind) {
    case "equals":
      return { key: expression.key, match: { value: expression.value } };
    case "and":
      return { must: expression.clauses.map(toNestedCondition) };
    case "or":
      return { should: expression.clauses.map(toNestedCondition) };
  }
};

const toNestedCondition = (expression: FilterExpression): IndexCondition =>
  expression.kind === "match_all" ? { must: [] } : toCondition(expression);

/** Translates an expression into the index's filter dialect; `undefined` means no filter. */
export const toQdrantFilter = (expression: FilterExpression): IndexFilter | undefined => {
  if (expression.kind === "match_all") {
    return undefined;
  }
  const condition = toCondition(expression);
  return "key" in condition ? { must: [condition] } : condition;
};

export const listFilterKeys = (expression: FilterExpression): string[] => {
  switch (expression.kind) {
    case "match_all":
      return [];
    case "equals":
      return [expression.key];
    case "and":
    case "or":
      return [...new Set(expression.clauses.flatMap(listFilterKeys))].sort();
  }
};
