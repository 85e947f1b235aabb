/**
 * Search Console tools exposed over MCP.
 *
 * Each tool takes an already-resolved access token and returns markdown.
 * Failures are thrown; the server turns them into "Error: ..." text.
 */

import {
    inspectUrl,
    listSitemaps,
    listSites,
    MAX_ROW_LIMIT,
    publishUrlUpdate,
    querySearchAnalytics,
    submitSitemap,
    UpstreamApiError,
    type AnalyticsQuery,
    type AnalyticsRow,
} from '../services/searchConsole';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SiteArgs {
    site_url: string;
}

export interface PeriodArgs extends SiteArgs {
    days: number;
}

export interface AnalyticsArgs extends PeriodArgs {
    dimensions: string;
}

export interface LimitedPeriodArgs extends PeriodArgs {
    limit: number;
}

export interface KeywordOpportunityArgs extends PeriodArgs {
    min_impressions: number;
    max_position: number;
    min_position: number;
}

export interface InspectUrlArgs extends SiteArgs {
    page_url: string;
}

export interface SubmitSitemapArgs extends SiteArgs {
    sitemap_url: string;
}

export interface RequestIndexingArgs {
    url: string;
}

export interface ExportArgs extends AnalyticsArgs {
    format: string;
    row_limit: number;
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Date window ending today (UTC) and starting `days` days earlier.
 */
export function dateRange(days: number, now: Date = new Date()): { startDate: string; endDate: string } {
    return {
        startDate: isoDate(new Date(now.getTime() - days * DAY_MS)),
        endDate: isoDate(now),
    };
}

export function parseDimensions(dimensions: string): string[] {
    return dimensions.split(',').map((d) => d.trim());
}

function withThousands(value: number): string {
    return value.toLocaleString('en-US');
}

function percent(ctr: number | undefined, digits: number): string {
    return `${((ctr ?? 0) * 100).toFixed(digits)}%`;
}

function fixed1(value: number | undefined): string {
    return (value ?? 0).toFixed(1);
}

/** Render a float argument with at least one decimal place: 4 -> "4.0". */
function floatArg(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function firstKey(row: AnalyticsRow, fallback: string): string {
    return row.keys?.[0] ?? fallback;
}

function sumClicks(rows: AnalyticsRow[]): number {
    return rows.reduce((total, row) => total + (row.clicks ?? 0), 0);
}

function share(clicks: number, total: number): string {
    return `${(total > 0 ? (clicks / total) * 100 : 0).toFixed(1)}%`;
}

async function query(
    accessToken: string,
    siteUrl: string,
    days: number,
    body: Omit<AnalyticsQuery, 'startDate' | 'endDate'>,
    now?: Date
): Promise<AnalyticsRow[]> {
    return querySearchAnalytics(accessToken, siteUrl, { ...dateRange(days, now), ...body });
}

export async function listProperties(accessToken: string): Promise<string> {
    const sites = await listSites(accessToken);
    if (sites.length === 0) {
        return 'No Search Console properties found.';
    }

    const lines = ['# Your Search Console Properties\n'];
    for (const site of sites) {
        lines.push(`- ${site.siteUrl ?? 'Unknown'} (${site.permissionLevel ?? 'Unknown'})`);
    }
    return lines.join('\n');
}

export async function getSearchAnalytics(accessToken: string, args: AnalyticsArgs, now?: Date): Promise<string> {
    const dimensions = parseDimensions(args.dimensions);
    const rows = await query(accessToken, args.site_url, args.days, { dimensions, rowLimit: 25 }, now);

    if (rows.length === 0) {
        return `No data found for ${args.site_url} in the last ${args.days} days.`;
    }

    const header = [...dimensions.map(capitalize), 'Clicks', 'Impr', 'CTR', 'Pos'];
    const lines = [
        `# Search Analytics: ${args.site_url}\n*Last ${args.days} days*\n`,
        `| ${header.join(' | ')} |`,
        `|${header.map(() => '---').join('|')}|`,
    ];

    for (const row of rows) {
        const cells = (row.keys ?? []).map((key) => key.slice(0, 50));
        cells.push(
            String(row.clicks ?? 0),
            String(row.impressions ?? 0),
            percent(row.ctr, 1),
            fixed1(row.position)
        );
        lines.push(`| ${cells.join(' | ')} |`);
    }

    return lines.join('\n');
}

export async function getPerformanceOverview(accessToken: string, args: PeriodArgs, now?: Date): Promise<string> {
    const rows = await query(accessToken, args.site_url, args.days, { dimensions: [], rowLimit: 1 }, now);
    const row = rows[0];
    if (!row) {
        return `No data found for ${args.site_url}`;
    }

    return [
        `# Performance Overview: ${args.site_url}\n`,
        `*Last ${args.days} days*\n`,
        '| Metric | Value |',
        '|--------|-------|',
        `| Clicks | ${withThousands(row.clicks ?? 0)} |`,
        `| Impressions | ${withThousands(row.impressions ?? 0)} |`,
        `| CTR | ${percent(row.ctr, 2)} |`,
        `| Avg Position | ${fixed1(row.position)} |`,
    ].join('\n');
}

interface Opportunity {
    query: string;
    page: string;
    clicks: number;
    impressions: number;
    ctr: number;
    position: number;
    potential: number;
}

/**
 * Queries ranking just off the top positions with enough impressions to be
 * worth improving, ordered by estimated extra clicks.
 */
export async function findKeywordOpportunities(
    accessToken: string,
    args: KeywordOpportunityArgs,
    now?: Date
): Promise<string> {
    const rows = await query(
        accessToken,
        args.site_url,
        args.days,
        { dimensions: ['query', 'page'], rowLimit: 5000 },
        now
    );

    if (rows.length === 0) {
        return `No data found for ${args.site_url}`;
    }

    const opportunities: Opportunity[] = [];
    for (const row of rows) {
        const position = row.position ?? 0;
        const impressions = row.impressions ?? 0;

        if (position >= args.min_position && position <= args.max_position && impressions >= args.min_impressions) {
            const ctr = row.ctr ?? 0;
            opportunities.push({
                query: row.keys?.[0] ?? '',
                page: row.keys?.[1] ?? '',
                clicks: row.clicks ?? 0,
                impressions,
                ctr,
                position,
                potential: impressions * (1 - ctr) * (1 / position),
            });
        }
    }

    opportunities.sort((a, b) => b.potential - a.potential);

    const lines = [
        `# 🎯 Keyword Opportunities: ${args.site_url}`,
        `*Last ${args.days} days | Position ${floatArg(args.min_position)}-${floatArg(args.max_position)} | Min ${args.min_impressions} impressions*\n`,
    ];

    if (opportunities.length === 0) {
        lines.push('No opportunities found. Try adjusting the filters.');
        return lines.join('\n');
    }

    lines.push(`Found **${opportunities.length}** opportunities. Top 20:\n`);
    lines.push('| Query | Position | Impressions | CTR | Clicks |');
    lines.push('|-------|----------|-------------|-----|--------|');

    for (const opp of opportunities.slice(0, 20)) {
        lines.push(
            `| ${opp.query.slice(0, 40)} | ${opp.position.toFixed(1)} | ${withThousands(opp.impressions)} | ` +
            `${percent(opp.ctr, 1)} | ${opp.clicks} |`
        );
    }

    return lines.join('\n');
}

export async function getTopPages(accessToken: string, args: LimitedPeriodArgs, now?: Date): Promise<string> {
    const rows = await query(
        accessToken,
        args.site_url,
        args.days,
        {
            dimensions: ['page'],
            rowLimit: args.limit,
            orderBy: [{ metric: 'CLICK_COUNT', direction: 'descending' }],
        },
        now
    );

    if (rows.length === 0) {
        return `No page data found for ${args.site_url}`;
    }

    const origin = args.site_url.replace(/\/+$/, '');
    const lines = [
        `# 📊 Top Pages: ${args.site_url}\n*Last ${args.days} days*\n`,
        '| # | Page | Clicks | Impressions | CTR | Position |',
        '|---|------|--------|-------------|-----|----------|',
    ];

    rows.forEach((row, index) => {
        const page = firstKey(row, '');
        const displayPage = page.replaceAll(origin, '').slice(0, 45) || page.slice(0, 45);
        lines.push(
            `| ${index + 1} | ${displayPage} | ${withThousands(row.clicks ?? 0)} | ${withThousands(row.impressions ?? 0)} | ` +
            `${percent(row.ctr, 1)} | ${fixed1(row.position)} |`
        );
    });

    return lines.join('\n');
}

const DEVICE_ICONS: Record<string, string> = {
    MOBILE: '📱',
    DESKTOP: '🖥️',
    TABLET: '📲',
};

export async function getDeviceComparison(accessToken: string, args: PeriodArgs, now?: Date): Promise<string> {
    const rows = await query(accessToken, args.site_url, args.days, { dimensions: ['device'], rowLimit: 10 }, now);

    if (rows.length === 0) {
        return `No device data found for ${args.site_url}`;
    }

    const total = sumClicks(rows);
    const lines = [
        `# 📱 Device Comparison: ${args.site_url}\n*Last ${args.days} days*\n`,
        '| Device | Clicks | Share | Impressions | CTR | Position |',
        '|--------|--------|-------|-------------|-----|----------|',
    ];

    for (const row of rows) {
        const device = firstKey(row, 'Unknown');
        const clicks = row.clicks ?? 0;
        const icon = DEVICE_ICONS[device.toUpperCase()] ?? '';
        lines.push(
            `| ${icon} ${device} | ${withThousands(clicks)} | ${share(clicks, total)} | ${withThousands(row.impressions ?? 0)} | ` +
            `${percent(row.ctr, 1)} | ${fixed1(row.position)} |`
        );
    }

    return lines.join('\n');
}

export async function getCountryBreakdown(accessToken: string, args: LimitedPeriodArgs, now?: Date): Promise<string> {
    const rows = await query(
        accessToken,
        args.site_url,
        args.days,
        {
            dimensions: ['country'],
            rowLimit: args.limit,
            orderBy: [{ metric: 'CLICK_COUNT', direction: 'descending' }],
        },
        now
    );

    if (rows.length === 0) {
        return `No country data found for ${args.site_url}`;
    }

    const total = sumClicks(rows);
    const lines = [
        `# 🌍 Country Breakdown: ${args.site_url}\n*Last ${args.days} days*\n`,
        '| Country | Clicks | Share | Impressions | CTR | Position |',
        '|---------|--------|-------|-------------|-----|----------|',
    ];

    for (const row of rows) {
        const clicks = row.clicks ?? 0;
        lines.push(
            `| ${firstKey(row, 'Unknown')} | ${withThousands(clicks)} | ${share(clicks, total)} | ${withThousands(row.impressions ?? 0)} | ` +
            `${percent(row.ctr, 1)} | ${fixed1(row.position)} |`
        );
    }

    return lines.join('\n');
}

export async function inspectPageUrl(accessToken: string, args: InspectUrlArgs): Promise<string> {
    const response = await inspectUrl(accessToken, args.site_url, args.page_url);
    if (!response.inspectionResult) {
        return `No inspection data for ${args.page_url}`;
    }

    const status = response.inspectionResult.indexStatusResult ?? {};
    const verdict = status.verdict ?? 'UNKNOWN';
    const emoji = verdict === 'PASS' ? '✅' : '❌';

    const lines = [
        `# URL Inspection: ${args.page_url}\n`,
        `## Status: ${emoji} ${verdict}\n`,
        `**Coverage:** ${status.coverageState ?? 'Unknown'}`,
        `**Robots.txt:** ${status.robotsTxtState ?? 'Unknown'}`,
        `**Indexing:** ${status.indexingState ?? 'Unknown'}`,
    ];

    if (status.lastCrawlTime !== undefined) {
        lines.push(`**Last Crawl:** ${status.lastCrawlTime}`);
    }
    if (status.googleCanonical !== undefined) {
        lines.push(`**Google Canonical:** ${status.googleCanonical}`);
    }

    return lines.join('\n');
}

export async function getSitemaps(accessToken: string, args: SiteArgs): Promise<string> {
    const sitemaps = await listSitemaps(accessToken, args.site_url);
    if (sitemaps.length === 0) {
        return `No sitemaps found for ${args.site_url}`;
    }

    const lines = [
        `# Sitemaps: ${args.site_url}\n`,
        '| Sitemap | URLs | Status |',
        '|---------|------|--------|',
    ];

    for (const sitemap of sitemaps) {
        const name = (sitemap.path ?? 'Unknown').split('/').pop()?.slice(0, 35) ?? '';
        const errorCount = sitemap.errors ?? 0;
        const status = errorCount === 0 ? '✅' : `⚠️ ${errorCount} errors`;
        const web = sitemap.contents?.find((content) => content.type === 'web');
        const urlCount = web ? String(web.submitted ?? 0) : 'N/A';

        lines.push(`| ${name} | ${urlCount} | ${status} |`);
    }

    return lines.join('\n');
}

export async function submitSitemapUrl(accessToken: string, args: SubmitSitemapArgs): Promise<string> {
    await submitSitemap(accessToken, args.site_url, args.sitemap_url);
    return `✅ Sitemap submitted: ${args.sitemap_url}\n\nGoogle will process it shortly.`;
}

export const INDEXING_PERMISSION_DENIED = [
    '❌ **Permission Denied**\n',
    'The Indexing API requires:',
    '1. Enable the Indexing API in Google Cloud Console',
    '2. Verify site ownership in Search Console',
    '3. Works primarily for JobPosting/BroadcastEvent pages',
].join('\n');

export async function requestIndexing(accessToken: string, args: RequestIndexingArgs): Promise<string> {
    try {
        await publishUrlUpdate(accessToken, args.url);
    } catch (err) {
        if (err instanceof UpstreamApiError && err.status === 403) {
            return INDEXING_PERMISSION_DENIED;
        }
        throw err;
    }

    return [
        '# ✅ Indexing Request Submitted\n',
        `**URL:** ${args.url}`,
        '\n## ⚠️ Note',
        'The Indexing API works best for JobPosting and BroadcastEvent pages.',
        'For other pages, Google may not immediately act on this request.',
    ].join('\n');
}

function csvCell(value: string): string {
    const escaped = value.replaceAll('"', '""');
    return escaped.includes(',') || escaped.includes('"') ? `"${escaped}"` : escaped;
}

export async function exportAnalytics(accessToken: string, args: ExportArgs, now?: Date): Promise<string> {
    const dimensions = parseDimensions(args.dimensions);
    const rows = await query(
        accessToken,
        args.site_url,
        args.days,
        { dimensions, rowLimit: Math.min(args.row_limit, MAX_ROW_LIMIT) },
        now
    );

    if (rows.length === 0) {
        return `No data to export for ${args.site_url}`;
    }

    if (args.format.toLowerCase() === 'json') {
        const data = rows.map((row) => {
            const item: Record<string, string | number> = {};
            dimensions.forEach((dimension, index) => {
                item[dimension] = row.keys?.[index] ?? '';
            });
            item.clicks = row.clicks ?? 0;
            item.impressions = row.impressions ?? 0;
            item.ctr = Number(((row.ctr ?? 0) * 100).toFixed(2));
            item.position = Number((row.position ?? 0).toFixed(1));
            return item;
        });
        return '```json\n' + JSON.stringify(data, null, 2) + '\n```';
    }

    const lines = [[...dimensions, 'clicks', 'impressions', 'ctr', 'position'].join(',')];
    for (const row of rows) {
        const values = dimensions.map((_, index) => csvCell(row.keys?.[index] ?? ''));
        values.push(
            String(row.clicks ?? 0),
            String(row.impressions ?? 0),
            ((row.ctr ?? 0) * 100).toFixed(2),
            fixed1(row.position)
        );
        lines.push(values.join(','));
    }
    return '```csv\n' + lines.join('\n') + '\n```';
}
