import { z } from 'zod';

// Loose shapes for the parts of GitHub payloads several tools read. Fields are
// nullish because the API omits them freely across endpoints and versions.

export const RawUserSchema = z.object({ login: z.string() }).passthrough().nullish();

export const RawLabelsSchema = z
  .array(z.union([z.object({ name: z.string().nullish() }).passthrough(), z.string()]))
  .nullish();

export const RawAssigneesSchema = z.array(z.object({ login: z.string() }).passthrough()).nullish();

type RawUser = z.infer<typeof RawUserSchema>;
type RawLabels = z.infer<typeof RawLabelsSchema>;
type RawAssignees = z.infer<typeof RawAssigneesSchema>;

export const loginOf = (user: RawUser): string | null => user?.login ?? null;

export const labelNames = (labels: RawLabels): readonly string[] =>
  (labels ?? []).flatMap((label) =>
    typeof label === 'string' || label.name == null ? [] : [label.name],
  );

export const assigneeLogins = (assignees: RawAssignees): readonly string[] =>
  (assignees ?? []).map((assignee) => assignee.login);

/** Parse a payload, naming the endpoint when its shape is not what we read. */
export const parsePayload = <S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string,
): z.infer<S> => {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new Error(
      `Unexpected GitHub response for ${what}${where}: ${issue?.message ?? 'invalid shape'}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
};
