/**
 * Per-connection MCP server.
 *
 * Every connection gets its own McpServer whose tool handlers close over
 * that connection's SessionBinding, so the identity used for a tool call is
 * always the one the connection was opened with.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { redactId, type Logger } from '../logger';
import type { LiveCredential } from '../services/credentials';
import type { SessionBinding } from './sessions';
import * as tools from './tools';

export const SERVER_NAME = 'gsc-mcp-gateway';
export const SERVER_VERSION = '2.0.0';

export type CredentialResolver = (userId: string) => Promise<LiveCredential>;

export interface GscMcpServerOptions {
    binding: SessionBinding;
    resolve: CredentialResolver;
    logger?: Logger;
}

const siteUrl = z.string().min(1).describe('The URL of the site in Search Console (sc-domain:example.com for domain properties)');
const days = z.number().int().positive().default(28).describe('Number of days to look back');
const dimensions = z.string().default('query').describe('Comma-separated dimensions: query, page, device, country, date');

function textResult(text: string): CallToolResult {
    return { content: [{ type: 'text', text }] };
}

/**
 * Build an MCP server bound to one connection.
 */
export function createGscMcpServer(options: GscMcpServerOptions): McpServer {
    const { binding, resolve, logger } = options;
    const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

    // Queue the call behind earlier ones on this connection, resolve the
    // bound user's credential and turn any failure into result text.
    const call = (
        tool: string,
        task: (accessToken: string) => Promise<string>,
        errorPrefix = 'Error'
    ): Promise<CallToolResult> =>
        binding.run(async () => {
            try {
                const credential = await resolve(binding.userId);
                return textResult(await task(credential.accessToken));
            } catch (err) {
                logger?.warn('tool_call_failed', {
                    tool,
                    user: redactId(binding.userId),
                    error: errorMessage(err),
                });
                return textResult(`${errorPrefix}: ${errorMessage(err)}`);
            }
        });

    server.registerTool(
        'list_properties',
        { description: 'List all Search Console properties for the authenticated user.' },
        () => call('list_properties', (token) => tools.listProperties(token))
    );

    server.registerTool(
        'get_search_analytics',
        {
            description: 'Get search analytics data for a property.',
            inputSchema: { site_url: siteUrl, days, dimensions },
        },
        (args) => call('get_search_analytics', (token) => tools.getSearchAnalytics(token, args))
    );

    server.registerTool(
        'get_performance_overview',
        {
            description: 'Get a performance overview (clicks, impressions, CTR, position) for a property.',
            inputSchema: { site_url: siteUrl, days },
        },
        (args) => call('get_performance_overview', (token) => tools.getPerformanceOverview(token, args))
    );

    server.registerTool(
        'find_keyword_opportunities',
        {
            description: 'Find queries with high impressions but room to improve their ranking.',
            inputSchema: {
                site_url: siteUrl,
                days,
                min_impressions: z.number().int().nonnegative().default(100).describe('Minimum impressions'),
                max_position: z.number().positive().default(20).describe('Maximum average position'),
                min_position: z.number().positive().default(4).describe('Minimum average position, excludes top rankings'),
            },
        },
        (args) => call('find_keyword_opportunities', (token) => tools.findKeywordOpportunities(token, args))
    );

    server.registerTool(
        'get_top_pages',
        {
            description: 'Get the top performing pages by clicks.',
            inputSchema: {
                site_url: siteUrl,
                days,
                limit: z.number().int().positive().default(20).describe('Number of pages to return'),
            },
        },
        (args) => call('get_top_pages', (token) => tools.getTopPages(token, args))
    );

    server.registerTool(
        'get_device_comparison',
        {
            description: 'Compare performance across devices (mobile, desktop, tablet).',
            inputSchema: { site_url: siteUrl, days },
        },
        (args) => call('get_device_comparison', (token) => tools.getDeviceComparison(token, args))
    );

    server.registerTool(
        'get_country_breakdown',
        {
            description: 'Get traffic breakdown by country.',
            inputSchema: {
                site_url: siteUrl,
                days,
                limit: z.number().int().positive().default(15).describe('Number of countries to show'),
            },
        },
        (args) => call('get_country_breakdown', (token) => tools.getCountryBreakdown(token, args))
    );

    server.registerTool(
        'inspect_url',
        {
            description: "Inspect a URL's indexing status.",
            inputSchema: {
                site_url: siteUrl,
                page_url: z.string().min(1).describe('The URL to inspect'),
            },
        },
        (args) => call('inspect_url', (token) => tools.inspectPageUrl(token, args))
    );

    server.registerTool(
        'get_sitemaps',
        {
            description: 'List all sitemaps for a property.',
            inputSchema: { site_url: siteUrl },
        },
        (args) => call('get_sitemaps', (token) => tools.getSitemaps(token, args))
    );

    server.registerTool(
        'submit_sitemap',
        {
            description: 'Submit a sitemap to Google.',
            inputSchema: {
                site_url: siteUrl,
                sitemap_url: z.string().min(1).describe('The full URL of the sitemap'),
            },
        },
        (args) => call('submit_sitemap', (token) => tools.submitSitemapUrl(token, args), 'Error submitting sitemap')
    );

    server.registerTool(
        'request_indexing',
        {
            description: 'Request Google to crawl and index a URL. Works best for JobPosting and BroadcastEvent pages.',
            inputSchema: {
                url: z.string().min(1).describe('The URL to request indexing for'),
            },
        },
        (args) => call('request_indexing', (token) => tools.requestIndexing(token, args))
    );

    server.registerTool(
        'export_analytics',
        {
            description: 'Export search analytics data as CSV or JSON.',
            inputSchema: {
                site_url: siteUrl,
                days,
                dimensions,
                format: z.string().default('csv').describe('Export format: csv or json'),
                row_limit: z.number().int().positive().default(500).describe('Maximum rows (capped at 25000)'),
            },
        },
        (args) => call('export_analytics', (token) => tools.exportAnalytics(token, args))
    );

    return server;
}
