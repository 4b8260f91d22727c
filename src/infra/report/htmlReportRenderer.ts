import {
  classifyReading,
  countZones,
  OVERBOUGHT_ABOVE,
  OVERSOLD_BELOW,
  sortRowsByReading,
  timeframeLabel,
  type ReportModel,
  type ReportRow,
} from "./reportModel";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

/**
 * JSON that is safe inside a `<script>` element: no `</script>`, comment openers or line separators survive.
 */
export const embedJson = (value: unknown): string =>
  JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/>/g, "\\u003e")
    .replace(/&/g, "\\u0026")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");

const formatReading = (value: number | null | undefined): string =>
  value === null || value === undefined ? "--" : value.toFixed(1);

const percent = (numerator: number, denominator: number): string =>
  denominator === 0 ? "0.0" : ((numerator / denominator) * 100).toFixed(1);

const renderRow = (row: ReportRow, timeframeIndex: number): string => {
  const value = row.readings[timeframeIndex] ?? null;
  const cellClass =
    value === null ? "rsi-cell no-data" : `rsi-cell rsi-${classifyReading(value)}`;

  return `<tr><td class="symbol-cell">${escapeHtml(row.symbol)}</td><td class="company-cell">${escapeHtml(row.company)}</td><td class="${cellClass}">${formatReading(value)}</td></tr>`;
};

const renderStats = (model: ReportModel, timeframeIndex: number): string => {
  const counts = countZones(model.rows, timeframeIndex);

  return [
    `<div class="stat-card" data-filter="oversold"><div class="stat-number">${counts.oversold}</div><div class="oversold">Oversold</div><small>(RSI &lt; ${OVERSOLD_BELOW})</small></div>`,
    `<div class="stat-card" data-filter="overbought"><div class="stat-number">${counts.overbought}</div><div class="overbought">Overbought</div><small>(RSI &gt; ${OVERBOUGHT_ABOVE})</small></div>`,
    `<div class="stat-card" data-filter="neutral"><div class="stat-number">${counts.neutral}</div><div class="neutral">Neutral</div><small>(RSI ${OVERSOLD_BELOW}-${OVERBOUGHT_ABOVE})</small></div>`,
    `<div class="stat-card active" data-filter="all"><div class="stat-number">${counts.total}</div><div>Total Monitored</div><small>out of ${model.universeSize}</small></div>`,
  ].join("\n        ");
};

const STYLES = `
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 20px; background: #f5f5f5; color: #333; }
    .container { max-width: 1100px; margin: 0 auto; background: white; border-radius: 12px; box-shadow: 0 4px 16px rgba(0,0,0,0.08); overflow: hidden; }
    .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 28px; text-align: center; }
    .header h1 { margin: 0 0 6px 0; }
    .status-bar { display: flex; gap: 24px; justify-content: space-between; padding: 12px 28px; background: #f8f9fa; font-size: 0.9em; }
    .timeframe-selector { padding: 16px 28px; }
    .stats { display: grid; grid-template-columns: repeat(4, 1fr); gap: 16px; padding: 0 28px 20px 28px; }
    .stat-card { background: #f8f9fa; border-radius: 8px; padding: 16px; text-align: center; cursor: pointer; border: 2px solid transparent; }
    .stat-card.active { border-color: #667eea; background: #e3f2fd; }
    .stat-number { font-size: 1.8em; font-weight: bold; }
    .oversold { color: #27ae5f; }
    .overbought { color: #e74c3c; }
    .neutral { color: #1299f3; }
    .table-container { padding: 0 28px 28px 28px; }
    table { width: 100%; border-collapse: collapse; }
    th, td { padding: 10px 12px; border-bottom: 1px solid #eee; text-align: left; }
    th { background: #f8f9fa; cursor: pointer; user-select: none; }
    th:hover { background: #e9ecef; }
    th.sort-asc::after { content: ' \\2191'; color: #007bff; }
    th.sort-desc::after { content: ' \\2193'; color: #007bff; }
    .symbol-cell { font-family: 'Courier New', monospace; font-weight: bold; color: #0066cc; }
    .company-cell { color: #666; font-size: 0.9em; min-width: 200px; }
    .rsi-cell { font-weight: bold; text-align: center; }
    .rsi-oversold { color: #27ae5f; }
    .rsi-overbought { color: #e74c3c; }
    .rsi-neutral { color: #1299f3; }
    .no-data { color: #999; font-style: italic; }
    .footer { text-align: center; padding: 20px; color: #666; font-size: 0.9em; }
    @media (max-width: 768px) {
      .stats { grid-template-columns: 1fr 1fr; }
      .table-container { overflow-x: auto; }
      .status-bar { flex-direction: column; }
    }`;

// Plain browser script; it mirrors the server-side render so the first paint needs no JavaScript.
const SCRIPT = `
    (function () {
      var report = JSON.parse(document.getElementById('report-data').textContent);
      var state = { timeframe: 0, filter: 'all', column: 2, direction: 'asc' };

      function zone(value) {
        if (value < report.oversoldBelow) return 'oversold';
        if (value > report.overboughtAbove) return 'overbought';
        return 'neutral';
      }

      function visibleRows() {
        var index = state.timeframe;
        var rows = report.rows.filter(function (row) {
          if (state.filter === 'all') return true;
          var value = row.readings[index];
          return value !== null && zone(value) === state.filter;
        });
        return rows.slice().sort(function (a, b) {
          var sign = state.direction === 'asc' ? 1 : -1;
          if (state.column === 2) {
            var left = a.readings[index], right = b.readings[index];
            if (left === null || right === null) return left === right ? 0 : left === null ? 1 : -1;
            return (left - right) * sign;
          }
          var key = state.column === 0 ? 'symbol' : 'company';
          return a[key].toLowerCase().localeCompare(b[key].toLowerCase()) * sign;
        });
      }

      function renderStats() {
        var counts = { oversold: 0, overbought: 0, neutral: 0, all: 0 };
        report.rows.forEach(function (row) {
          var value = row.readings[state.timeframe];
          if (value === null) return;
          counts.all += 1;
          counts[zone(value)] += 1;
        });
        document.querySelectorAll('.stat-card').forEach(function (card) {
          var filter = card.getAttribute('data-filter');
          card.querySelector('.stat-number').textContent = String(counts[filter]);
          card.classList.toggle('active', filter === state.filter);
        });
      }

      function renderTable() {
        var body = document.getElementById('stockTableBody');
        var rows = visibleRows();
        body.textContent = '';
        if (rows.length === 0) {
          var empty = document.createElement('tr');
          var cell = document.createElement('td');
          cell.colSpan = 3;
          cell.className = 'no-data';
          cell.textContent = 'No stocks match the current filter criteria';
          empty.appendChild(cell);
          body.appendChild(empty);
          return;
        }
        rows.forEach(function (row) {
          var tr = document.createElement('tr');
          var value = row.readings[state.timeframe];
          [
            ['symbol-cell', row.symbol],
            ['company-cell', row.company],
            [value === null ? 'rsi-cell no-data' : 'rsi-cell rsi-' + zone(value), value === null ? '--' : value.toFixed(1)]
          ].forEach(function (spec) {
            var td = document.createElement('td');
            td.className = spec[0];
            td.textContent = spec[1];
            tr.appendChild(td);
          });
          body.appendChild(tr);
        });
        document.querySelectorAll('th[data-column]').forEach(function (th) {
          var active = Number(th.getAttribute('data-column')) === state.column;
          th.classList.toggle('sort-asc', active && state.direction === 'asc');
          th.classList.toggle('sort-desc', active && state.direction === 'desc');
        });
      }

      document.getElementById('timeframeSelect').addEventListener('change', function (event) {
        state.timeframe = Number(event.target.value);
        renderStats();
        renderTable();
      });
      document.querySelectorAll('.stat-card').forEach(function (card) {
        card.addEventListener('click', function () {
          state.filter = card.getAttribute('data-filter');
          renderStats();
          renderTable();
        });
      });
      document.querySelectorAll('th[data-column]').forEach(function (th) {
        th.addEventListener('click', function () {
          var column = Number(th.getAttribute('data-column'));
          state.direction = state.column === column && state.direction === 'asc' ? 'desc' : 'asc';
          state.column = column;
          renderTable();
        });
      });
    })();`;

/**
 * Renders the self-contained report page. The first timeframe is rendered server-side, sorted by RSI
 * ascending; the inline script takes over for timeframe, filter and sort changes.
 */
export const renderReportHtml = (model: ReportModel): string => {
  const initialRows = sortRowsByReading(model.rows, 0);
  const options = model.timeframes
    .map(
      (timeframe, index) =>
        `<option value="${index}"${index === 0 ? " selected" : ""}>${escapeHtml(timeframeLabel(timeframe))}</option>`,
    )
    .join("");
  const payload = embedJson({
    timeframes: model.timeframes,
    oversoldBelow: OVERSOLD_BELOW,
    overboughtAbove: OVERBOUGHT_ABOVE,
    rows: model.rows,
  });
  const { totals } = model;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Multi-Timeframe RSI Monitor${model.exchange ? ` - ${escapeHtml(model.exchange)}` : ""}</title>
  <style>${STYLES}
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>Daily RSI Monitor</h1>
      <p>${escapeHtml(model.exchange)}</p>
    </div>
    <div class="status-bar">
      <span>Last update: ${escapeHtml(model.lastUpdate)} (${escapeHtml(model.timeZone)})</span>
      <span>Success rate: ${percent(totals.success, totals.total)}%</span>
      <span>Fetched: ${totals.success}/${totals.total}</span>
      <span>Failed: ${totals.failed}</span>
    </div>
    <div class="timeframe-selector">
      <label for="timeframeSelect">Select Timeframe:</label>
      <select id="timeframeSelect">${options}</select>
    </div>
    <div class="stats" id="statsSection">
        ${renderStats(model, 0)}
    </div>
    <div class="table-container">
      <table>
        <thead>
          <tr>
            <th data-column="0">Symbol</th>
            <th data-column="1">Company</th>
            <th data-column="2" class="sort-asc">RSI</th>
          </tr>
        </thead>
        <tbody id="stockTableBody">
${initialRows.map((row) => `          ${renderRow(row, 0)}`).join("\n")}
        </tbody>
      </table>
    </div>
    <div class="footer">
      <p>Last Successful Update: ${escapeHtml(model.lastUpdate)}</p>
    </div>
  </div>
  <script type="application/json" id="report-data">${payload}</script>
  <script>${SCRIPT}
  </script>
</body>
</html>
`;
};
