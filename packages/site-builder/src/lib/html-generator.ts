import { escapeHtml } from "@quire/utils";

export interface ThemeAttributes {
  theme: string;
  /** Alternate dark theme; wires the sidebar's toggle button when set */
  darkTheme?: string;
}

/**
 * Generates the HTML document around rendered page content
 */
export function createHTMLShell(
  content: string,
  headContent: string,
  theme: ThemeAttributes,
): string {
  const themeAttr = ` data-theme="${escapeHtml(theme.theme)}"`;

  // Runs before first paint so the stored choice applies without a flash
  const themeScript = theme.darkTheme
    ? `
    <script>
      (function() {
        var light = '${escapeHtml(theme.theme)}';
        var dark = '${escapeHtml(theme.darkTheme)}';
        var stored = localStorage.getItem('quire-theme');
        if (stored === light || stored === dark) {
          document.documentElement.setAttribute('data-theme', stored);
        }
        document.addEventListener('DOMContentLoaded', function() {
          var toggle = document.querySelector('.theme-toggle');
          if (!toggle) return;
          toggle.addEventListener('click', function() {
            var current = document.documentElement.getAttribute('data-theme');
            var next = current === dark ? light : dark;
            document.documentElement.setAttribute('data-theme', next);
            localStorage.setItem('quire-theme', next);
          });
        });
      })();
    </script>`
    : "";

  return `<!DOCTYPE html>
<html lang="en"${themeAttr}>
<head>
    ${headContent}${themeScript}
</head>
<body>
${content}
</body>
</html>
`;
}
