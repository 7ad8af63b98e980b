/**
 * Recipe payload schema.
 *
 * Strict at every level: unknown fields are rejected rather than stripped.
 * Date and duration fields are strings with a documented format.
 */

import { z } from 'zod';

export const DESCRIPTION_MIN_LENGTH = 10;
export const DESCRIPTION_MAX_LENGTH = 500;
export const RATING_MIN = 0;
export const RATING_MAX = 5;

/**
 * Recipe ids are path segments and file names, so the alphabet is restricted.
 * The length cap keeps `<id>.json` and `.<id>.<uuid>.tmp` under 255 bytes.
 */
export const RECIPE_ID_MAX_LENGTH = 200;
export const RECIPE_ID_PATTERN = new RegExp(`^[A-Za-z0-9-]{1,${RECIPE_ID_MAX_LENGTH}}$`);

/** YYYY-MM-DD */
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** HH:MM, or an ISO-8601 duration such as PT1H30M */
const DURATION_PATTERN = /^(?:\d{2}:[0-5]\d|P(?:\d+D)?(?:T(?=\d)(?:\d+H)?(?:\d+M)?(?:\d+S)?)?)$/;

/**
 * Checks a YYYY-MM-DD string names a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Checks a duration string; a bare "P" carries no duration.
 */
export function isDuration(value: string): boolean {
  return value !== 'P' && DURATION_PATTERN.test(value);
}

export function isValidRecipeId(id: string): boolean {
  return RECIPE_ID_PATTERN.test(id);
}

/** Length in code points, so astral characters such as emoji count once */
export function characterCount(value: string): number {
  return [...value].length;
}

const nonEmptyString = (field: string) => z.string().min(1, `${field} cannot be empty`);

const durationString = (field: string) =>
  z.string().refine(isDuration, { message: `${field} must be HH:MM or an ISO-8601 duration` });

export const NutritionSchema = z
  .object({
    servingSize: nonEmptyString('servingSize'),
    calories: z.number().finite().min(0, 'calories cannot be negative'),
  })
  .strict();

export const RecipeInputSchema = z
  .object({
    name: nonEmptyString('name'),
    datePublished: z.string().refine(isCalendarDate, { message: 'datePublished must be a YYYY-MM-DD date' }),
    description: z.string().superRefine((value, ctx) => {
      const length = characterCount(value);
      if (length < DESCRIPTION_MIN_LENGTH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `description must be at least ${DESCRIPTION_MIN_LENGTH} characters`,
        });
      } else if (length > DESCRIPTION_MAX_LENGTH) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `description must be ${DESCRIPTION_MAX_LENGTH} characters or less`,
        });
      }
    }),
    rating: z
      .number()
      .min(RATING_MIN, `rating must be at least ${RATING_MIN}`)
      .max(RATING_MAX, `rating must be at most ${RATING_MAX}`)
      .optional(),
    prepTime: durationString('prepTime'),
    cookTime: durationString('cookTime'),
    ingredients: z.array(nonEmptyString('ingredient')).min(1, 'ingredients cannot be empty'),
    instructions: z.array(nonEmptyString('instruction')).min(1, 'instructions cannot be empty'),
    nutrition: NutritionSchema,
  })
  .strict();

/** A stored recipe document, as written by the filesystem backend */
export const StoredRecipeSchema = RecipeInputSchema.extend({
  id: z.string().regex(RECIPE_ID_PATTERN),
}).strict();
