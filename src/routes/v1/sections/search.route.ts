/**
 * POST /api/v1/sections/search
 *
 * Finds the contract section with the most keyword overlap with a query.
 *
 * Request body (JSON):
 *   {
 *     text: string   // Plaintext contract
 *     query: string  // Free-text query (max 2000 chars)
 *   }
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { chunkText } from '../../../ingestion/chunker.js';
import { retrieveRelevantSection } from '../../../ingestion/retrieval.js';
import { InputError } from '../../../lib/errors.js';

const SearchBodySchema = z.object({
    text: z.string().min(1),
    query: z.string().trim().min(1).max(2000),
});

export default async function searchSectionsRoute(fastify: FastifyInstance) {
    fastify.post('/sections/search', async (request, reply) => {
        const parsed = SearchBodySchema.safeParse(request.body);
        if (!parsed.success) {
            throw InputError.fromZod('Invalid section search request', parsed.error);
        }

        return reply.send(retrieveRelevantSection(chunkText(parsed.data.text), parsed.data.query));
    });
}
