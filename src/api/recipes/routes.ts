/**
 * Recipe REST API routes.
 *
 * Exports a Fastify plugin that registers all /v1/recipes endpoints.
 * Service errors are rendered by the server's error handler.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RecipeService } from './service.ts';

export const RECIPES_PATH = '/v1/recipes';

/** Location of a single recipe */
export function recipeUri(id: string): string {
  return `${RECIPES_PATH}/${encodeURIComponent(id)}`;
}

/** Route params with an id field. */
interface IdParams {
  id: string;
}

export interface RecipeRoutesOptions {
  service: RecipeService;
  /** Budget for one request's storage work */
  requestTimeoutMs: number;
}

/**
 * Fastify plugin that registers all /v1/recipes routes.
 *
 * Usage:
 * ```ts
 * app.register(recipeRoutesPlugin, { service, requestTimeoutMs: 10000 });
 * ```
 */
export async function recipeRoutesPlugin(app: FastifyInstance, opts: RecipeRoutesOptions): Promise<void> {
  const { service, requestTimeoutMs } = opts;
  const operationOptions = () => ({ signal: AbortSignal.timeout(requestTimeoutMs) });

  // GET /v1/recipes: list every recipe
  app.get(RECIPES_PATH, async () => service.listRecipes(operationOptions()));

  // POST /v1/recipes: create a recipe
  app.post(RECIPES_PATH, async (req: FastifyRequest, reply: FastifyReply) => {
    const recipe = await service.createRecipe(req.body, operationOptions());
    return reply.code(201).header('Location', recipeUri(recipe.id)).send(recipe);
  });

  // GET /v1/recipes/:id: get one recipe
  app.get<{ Params: IdParams }>(`${RECIPES_PATH}/:id`, async (req) => service.getRecipe(req.params.id, operationOptions()));

  // PUT /v1/recipes/:id: replace a recipe
  app.put<{ Params: IdParams }>(`${RECIPES_PATH}/:id`, async (req) =>
    service.updateRecipe(req.params.id, req.body, operationOptions()),
  );

  // DELETE /v1/recipes/:id: delete a recipe
  app.delete<{ Params: IdParams }>(`${RECIPES_PATH}/:id`, async (req, reply) => {
    await service.deleteRecipe(req.params.id, operationOptions());
    return reply.code(204).send();
  });
}
