export const REPORT_STYLES = `
body { margin: 0; padding: 24px; background-color: #f9fafb; color: #1f2937; font-family: "Segoe UI", Arial, sans-serif; font-size: 14px; }
.report-header { margin-bottom: 16px; border-bottom: 2px solid #e5e7eb; padding-bottom: 12px; }
.report-header h1 { margin: 0 0 4px; font-size: 24px; }
.summary { margin: 0; color: #6b7280; }
.toolbar { display: flex; flex-wrap: wrap; align-items: flex-end; gap: 8px 12px; margin-bottom: 12px; }
.toolbar button { padding: 4px 10px; border: 1px solid #d1d5db; border-radius: 4px; background-color: #ffffff; cursor: pointer; }
.filter { display: flex; flex-direction: column; font-size: 12px; color: #4b5563; }
.filter select { min-width: 140px; padding: 3px; }
#visible-count { margin-left: auto; color: #6b7280; }
.incident-table { width: 100%; border-collapse: collapse; background-color: #ffffff; }
.incident-table th { position: sticky; top: 0; padding: 6px 8px; background-color: #111827; color: #f9fafb; text-align: left; font-size: 12px; text-transform: uppercase; letter-spacing: 0.04em; }
.incident-table td { padding: 6px 8px; border-top: 1px solid #e5e7eb; vertical-align: top; }
.incident-row:hover { background-color: #f3f4f6; }
.row-toggle { width: 24px; height: 24px; border: 1px solid #d1d5db; border-radius: 4px; background-color: #ffffff; font-weight: bold; cursor: pointer; }
.cell-id, .cell-created { white-space: nowrap; font-family: Consolas, monospace; }
.status-badge { display: inline-block; padding: 2px 8px; border-radius: 9999px; color: #ffffff; font-size: 12px; font-weight: 600; }
.pill { display: inline-block; min-width: 20px; padding: 1px 6px; border-radius: 9999px; background-color: #2563eb; color: #ffffff; text-align: center; font-size: 12px; }
.pill-zero { background-color: #e5e7eb; color: #6b7280; }
.detail-row td { background-color: #f9fafb; }
.detail-list { display: grid; grid-template-columns: max-content 1fr; gap: 4px 16px; margin: 4px 0 4px 32px; }
.detail-list dt { font-weight: 600; color: #4b5563; }
.detail-list dd { margin: 0; }
.empty-state { padding: 16px; color: #6b7280; font-style: italic; }
[hidden] { display: none !important; }
`;
