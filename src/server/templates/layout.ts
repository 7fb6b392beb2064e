/**
 * Base HTML layout
 */

/**
 * Get base CSS styles
 */
export function getBaseStyles(): string {
  return `
    :root {
      --bg-primary: #0d1117;
      --bg-secondary: #161b22;
      --bg-tertiary: #21262d;
      --border-color: #30363d;
      --text-primary: #e6edf3;
      --text-secondary: #8b949e;
      --accent-blue: #00d4ff;
      --accent-red: #f85149;
    }

    * {
      box-sizing: border-box;
      margin: 0;
      padding: 0;
    }

    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', 'Noto Sans', Helvetica, Arial, sans-serif;
      font-size: 14px;
      line-height: 1.5;
      color: var(--text-primary);
      background: var(--bg-primary);
      min-height: 100vh;
    }

    a {
      color: var(--accent-blue);
      text-decoration: none;
    }

    a:hover {
      text-decoration: underline;
    }

    .header {
      display: flex;
      justify-content: space-between;
      align-items: center;
      padding: 16px 24px;
      background: var(--bg-secondary);
      border-bottom: 1px solid var(--border-color);
    }

    .header-title {
      font-size: 18px;
      font-weight: 600;
    }

    .hash {
      font-family: ui-monospace, SFMono-Regular, Menlo, monospace;
      color: var(--text-secondary);
    }

    .main {
      padding: 24px;
    }

    .section {
      margin-bottom: 24px;
    }

    .section-title {
      font-size: 16px;
      font-weight: 600;
      margin-bottom: 12px;
    }

    table.rows {
      border-collapse: collapse;
      font-family: ui-monospace, SFMono-Regular, Menlo, monospace;
      font-size: 12px;
    }

    table.rows th, table.rows td {
      border: 1px solid var(--border-color);
      padding: 4px 8px;
      text-align: left;
      vertical-align: top;
    }

    table.rows th {
      background: var(--bg-tertiary);
    }

    .null {
      color: var(--text-secondary);
      font-style: italic;
    }

    .error {
      padding: 12px;
      border: 1px solid var(--accent-red);
      color: var(--accent-red);
      margin-bottom: 16px;
    }

    textarea {
      width: 100%;
      min-height: 80px;
      background: var(--bg-secondary);
      color: var(--text-primary);
      border: 1px solid var(--border-color);
      font-family: ui-monospace, SFMono-Regular, Menlo, monospace;
      padding: 8px;
    }
  `;
}

/**
 * Render base HTML layout
 */
export function renderLayout(options: {
  title: string;
  heading: string;
  content: string;
}): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(options.title)}</title>
  <style>
${getBaseStyles()}
  </style>
</head>
<body>
  <header class="header">
    <div class="header-title">${options.heading}</div>
    <div><a href="/">All databases</a></div>
  </header>
  <main class="main">
${options.content}
  </main>
</body>
</html>`;
}

/**
 * Escape HTML special characters
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
