import { z } from 'zod';
import { InvalidOptionsError } from '../errors';
import type { Logger } from '../logger';

export const ShortestPathsOptionsSchema = z
	.object({
		algorithm: z.enum(['auto', 'dijkstra', 'bellman-ford']).default('auto'),
		detectNegativeCycles: z.boolean().default(false)
	})
	.strict();

export type AlgorithmChoice = z.infer<typeof ShortestPathsOptionsSchema>['algorithm'];

export type ShortestPathsOptions = z.input<typeof ShortestPathsOptionsSchema> & {
	logger?: Logger;
};

export type ResolvedShortestPathsOptions = z.output<typeof ShortestPathsOptionsSchema>;

export function parseShortestPathsOptions(options: unknown): ResolvedShortestPathsOptions {
	const result = ShortestPathsOptionsSchema.safeParse(options);
	if (!result.success) {
		throw new InvalidOptionsError(
			result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
		);
	}
	return result.data;
}
