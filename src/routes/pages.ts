/**
 * HTML pages for the browser-facing sign-in flow.
 */

/**
 * Escape HTML special characters to prevent XSS.
 */
export function escapeHtml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#039;');
}

const BASE_STYLES = `
        * { margin: 0; padding: 0; box-sizing: border-box; }
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, sans-serif;
            background: #0a0a0f;
            min-height: 100vh;
            display: flex;
            align-items: center;
            justify-content: center;
            color: #e0e0e0;
        }
        .container {
            padding: 2rem;
            max-width: 760px;
            width: 100%;
        }
        .center { text-align: center; }
        .icon {
            font-size: 4rem;
            margin-bottom: 1rem;
        }
        h1 {
            font-size: 1.75rem;
            margin-bottom: 0.75rem;
        }
        p {
            color: #a0aec0;
            line-height: 1.6;
        }
        a { color: #00ff88; }
        code, pre {
            font-family: 'SF Mono', 'Fira Code', monospace;
        }
        .card {
            background: rgba(255, 255, 255, 0.03);
            border: 1px solid rgba(255, 255, 255, 0.1);
            border-radius: 16px;
            padding: 1.5rem;
            margin-top: 1.5rem;
        }
        .card h3 { margin-bottom: 0.75rem; }
        .api-key {
            background: rgba(0, 255, 136, 0.08);
            border-radius: 8px;
            padding: 0.75rem 1rem;
            word-break: break-all;
            color: #00ff88;
        }
        pre {
            background: rgba(0, 0, 0, 0.4);
            border-radius: 8px;
            padding: 1rem;
            overflow-x: auto;
            font-size: 0.875rem;
        }
        .warning {
            border-color: rgba(255, 170, 0, 0.4);
            color: #ffaa00;
        }
        .button {
            display: inline-block;
            margin-top: 2rem;
            padding: 0.875rem 2rem;
            border-radius: 10px;
            background: #00ff88;
            color: #0a0a0f;
            font-weight: 600;
            text-decoration: none;
        }`;

function renderPage(title: string, body: string): string {
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)} - GSC MCP Gateway</title>
    <style>${BASE_STYLES}
    </style>
</head>
<body>
    <div class="container">
${body}
    </div>
</body>
</html>`;
}

/**
 * Landing page with the sign-in link.
 */
export function renderHomePage(): string {
    return renderPage('Google Search Console for MCP', `
        <div class="center">
            <div class="icon">🔍</div>
            <h1>Google Search Console for MCP</h1>
            <p>Connect your Search Console data to any MCP client. Sign in with Google
            to receive a personal API key and a ready-to-paste client configuration.</p>
            <a class="button" href="/oauth/login">Sign in with Google</a>
        </div>`);
}

/**
 * Render an error page HTML.
 */
export function renderErrorPage(title: string, message: string): string {
    return renderPage(title, `
        <div class="center">
            <div class="icon">❌</div>
            <h1>${escapeHtml(title)}</h1>
            <p>${escapeHtml(message)}</p>
            <p><a href="/">Try again</a></p>
        </div>`);
}

/**
 * Client configuration pointing an stdio-only MCP client at the SSE endpoint.
 */
export function buildClientConfig(sseUrl: string): string {
    return JSON.stringify(
        {
            mcpServers: {
                gscServer: {
                    command: 'npx',
                    args: ['-y', 'mcp-remote', sseUrl],
                },
            },
        },
        null,
        2
    );
}

/**
 * Render the post-login page disclosing the new API key.
 */
export function renderSuccessPage(userId: string, email: string, baseUrl: string): string {
    const sseUrl = `${baseUrl}/mcp/${userId}/sse`;

    return renderPage('Authentication Successful', `
        <div class="center">
            <div class="icon">✅</div>
            <h1>Authentication Successful!</h1>
            <p>Logged in as: ${escapeHtml(email)}</p>
        </div>

        <div class="card">
            <h3>🔑 Your API Key</h3>
            <div class="api-key">${escapeHtml(userId)}</div>
        </div>

        <div class="card">
            <h3>⚙️ Setup Instructions</h3>
            <p>Add this server to your MCP client configuration, then restart the client:</p>
            <pre>${escapeHtml(buildClientConfig(sseUrl))}</pre>
            <p>Streamable HTTP clients can connect to <code>${escapeHtml(`${baseUrl}/mcp/${userId}`)}</code> directly.</p>
        </div>

        <div class="card">
            <h3>🔧 Manage Access</h3>
            <p>Status: <code>${escapeHtml(`${baseUrl}/api/status/${userId}`)}</code></p>
            <p>Revoke: <code>${escapeHtml(`${baseUrl}/oauth/revoke/${userId}`)}</code></p>
        </div>

        <div class="card warning">
            <strong>⚠️ Keep your API key secret!</strong>
            <p>Anyone with this key can access your Google Search Console data.</p>
        </div>`);
}
