/**
 * Google Search Console and Indexing API client.
 *
 * Thin fetch wrappers; every call takes an already-resolved access token.
 */

import { z } from 'zod';

export const SEARCH_CONSOLE_API = 'https://searchconsole.googleapis.com';
export const INDEXING_API = 'https://indexing.googleapis.com';

/** Search analytics queries are capped at this many rows upstream. */
export const MAX_ROW_LIMIT = 25000;

/**
 * Error thrown when a Search Console or Indexing API call fails.
 */
export class UpstreamApiError extends Error {
    constructor(
        public readonly status: number,
        public readonly body: unknown,
        message: string
    ) {
        super(message);
        this.name = 'UpstreamApiError';
    }
}

const siteEntrySchema = z.object({
    siteUrl: z.string().optional(),
    permissionLevel: z.string().optional(),
});

const sitesResponseSchema = z.object({
    siteEntry: z.array(siteEntrySchema).optional(),
});

const analyticsRowSchema = z.object({
    keys: z.array(z.string()).optional(),
    clicks: z.number().optional(),
    impressions: z.number().optional(),
    ctr: z.number().optional(),
    position: z.number().optional(),
});

const analyticsResponseSchema = z.object({
    rows: z.array(analyticsRowSchema).optional(),
});

const sitemapSchema = z.object({
    path: z.string().optional(),
    errors: z.coerce.number().optional(),
    contents: z
        .array(
            z.object({
                type: z.string().optional(),
                submitted: z.coerce.number().optional(),
            })
        )
        .optional(),
});

const sitemapsResponseSchema = z.object({
    sitemap: z.array(sitemapSchema).optional(),
});

const indexStatusSchema = z.object({
    verdict: z.string().optional(),
    coverageState: z.string().optional(),
    robotsTxtState: z.string().optional(),
    indexingState: z.string().optional(),
    lastCrawlTime: z.string().optional(),
    googleCanonical: z.string().optional(),
});

const inspectionResponseSchema = z.object({
    inspectionResult: z
        .object({
            indexStatusResult: indexStatusSchema.optional(),
        })
        .optional(),
});

export type SiteEntry = z.infer<typeof siteEntrySchema>;
export type AnalyticsRow = z.infer<typeof analyticsRowSchema>;
export type Sitemap = z.infer<typeof sitemapSchema>;
export type InspectionResponse = z.infer<typeof inspectionResponseSchema>;

export interface AnalyticsQuery {
    startDate: string;
    endDate: string;
    dimensions: string[];
    rowLimit: number;
    orderBy?: { metric: string; direction: 'ascending' | 'descending' }[];
}

function describeUpstreamError(body: unknown, fallback: string): string {
    const parsed = z
        .object({ error: z.object({ message: z.string() }) })
        .safeParse(body);
    return parsed.success ? parsed.data.error.message : fallback;
}

async function callApi<T>(
    accessToken: string,
    url: string,
    schema: z.ZodType<T>,
    init: { method?: string; body?: unknown } = {}
): Promise<T> {
    const response = await fetch(url, {
        method: init.method ?? 'GET',
        headers: {
            Authorization: `Bearer ${accessToken}`,
            ...(init.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
        },
        body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
    });

    if (!response.ok) {
        const errorBody = await response.json().catch(() => null);
        throw new UpstreamApiError(
            response.status,
            errorBody,
            `Google API request failed (${response.status}): ${describeUpstreamError(errorBody, response.statusText)}`
        );
    }

    const text = await response.text();
    const parsed = schema.safeParse(text ? JSON.parse(text) : {});
    if (!parsed.success) {
        throw new UpstreamApiError(response.status, text, 'Unexpected response from Google API');
    }
    return parsed.data;
}

function siteBase(siteUrl: string): string {
    return `${SEARCH_CONSOLE_API}/webmasters/v3/sites/${encodeURIComponent(siteUrl)}`;
}

/**
 * List the properties the account can see.
 */
export async function listSites(accessToken: string): Promise<SiteEntry[]> {
    const result = await callApi(accessToken, `${SEARCH_CONSOLE_API}/webmasters/v3/sites`, sitesResponseSchema);
    return result.siteEntry ?? [];
}

/**
 * Run a search analytics query against a property.
 */
export async function querySearchAnalytics(
    accessToken: string,
    siteUrl: string,
    query: AnalyticsQuery
): Promise<AnalyticsRow[]> {
    const result = await callApi(
        accessToken,
        `${siteBase(siteUrl)}/searchAnalytics/query`,
        analyticsResponseSchema,
        { method: 'POST', body: query }
    );
    return result.rows ?? [];
}

export async function listSitemaps(accessToken: string, siteUrl: string): Promise<Sitemap[]> {
    const result = await callApi(accessToken, `${siteBase(siteUrl)}/sitemaps`, sitemapsResponseSchema);
    return result.sitemap ?? [];
}

export async function submitSitemap(accessToken: string, siteUrl: string, sitemapUrl: string): Promise<void> {
    await callApi(
        accessToken,
        `${siteBase(siteUrl)}/sitemaps/${encodeURIComponent(sitemapUrl)}`,
        z.unknown(),
        { method: 'PUT' }
    );
}

export async function inspectUrl(
    accessToken: string,
    siteUrl: string,
    pageUrl: string
): Promise<InspectionResponse> {
    return callApi(
        accessToken,
        `${SEARCH_CONSOLE_API}/v1/urlInspection/index:inspect`,
        inspectionResponseSchema,
        { method: 'POST', body: { inspectionUrl: pageUrl, siteUrl } }
    );
}

/**
 * Notify the Indexing API that a URL was updated.
 */
export async function publishUrlUpdate(accessToken: string, url: string): Promise<void> {
    await callApi(
        accessToken,
        `${INDEXING_API}/v3/urlNotifications:publish`,
        z.unknown(),
        { method: 'POST', body: { url, type: 'URL_UPDATED' } }
    );
}
