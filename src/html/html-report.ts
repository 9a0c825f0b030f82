import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { ChartTheme, NamedChart } from '../charts/chart-types.js'
import { THEME_COLORS, renderPlotlyFigure } from '../charts/plotly-renderer.js'
import type { DateRange, ExpenseTree, YearKey } from '../reporting/types.js'
import { formatLocalDate, formatMoney } from '../shared/format.js'

export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.35.2.min.js'

export interface ReportPage {
  title: string
  currency: string
  /** YYYY-MM-DD */
  generatedOn: string
  range: DateRange
  theme: ChartTheme
  overview: NamedChart[]
  categoryDetails: NamedChart[]
  categoryAverages: NamedChart[]
  expenseTree: ExpenseTree
  years: YearKey[]
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch)

/**
 * JSON that can sit inside a `<script>` element without closing it early.
 */
export const toScriptJson = (value: unknown): string =>
  JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029')

const renderChartSection = (
  heading: string,
  idPrefix: string,
  charts: NamedChart[],
  theme: ChartTheme
): string => {
  if (charts.length === 0) return ''

  const blocks = charts.map((chart, i) => {
    const id = `${idPrefix}-${i}`
    return [
      `<article class="chart">`,
      `<h3>${escapeHtml(chart.name)}</h3>`,
      `<div id="${id}" class="plot"></div>`,
      `<script type="application/json" data-figure="${id}">${toScriptJson(renderPlotlyFigure(chart.spec, theme))}</script>`,
      `</article>`,
    ].join('\n')
  })

  return [`<section>`, `<h2>${escapeHtml(heading)}</h2>`, ...blocks, `</section>`].join('\n')
}

/**
 * Category and subcategory totals with one column per year.
 */
export const renderSummaryTable = (
  tree: ExpenseTree,
  years: YearKey[],
  currency: string
): string => {
  const cells = (total: number, byYear: Map<YearKey, number>) =>
    [total, ...years.map((year) => byYear.get(year) ?? 0)]
      .map((value) => `<td class="amount">${escapeHtml(formatMoney(value, currency))}</td>`)
      .join('')

  const header = ['Category', 'Subcategory', 'Total', ...years.map(String)]
    .map((label) => `<th>${escapeHtml(label)}</th>`)
    .join('')

  const rows: string[] = [
    `<tr class="overall"><td>All expenses</td><td></td>${cells(tree.total, tree.byYear)}</tr>`,
  ]
  for (const [name, category] of tree.categories) {
    rows.push(
      `<tr class="category"><td>${escapeHtml(name)}</td><td></td>${cells(category.total, category.byYear)}</tr>`
    )
    for (const [subName, subcategory] of category.subcategories) {
      rows.push(
        `<tr class="subcategory"><td></td><td>${escapeHtml(subName)}</td>${cells(subcategory.total, subcategory.byYear)}</tr>`
      )
    }
  }

  return [
    `<table class="summary">`,
    `<thead><tr>${header}</tr></thead>`,
    `<tbody>`,
    ...rows,
    `</tbody>`,
    `</table>`,
  ].join('\n')
}

const pageStyles = (theme: ChartTheme): string => {
  const colors = THEME_COLORS[theme]
  return `
body { font-family: system-ui, sans-serif; background: ${colors.background}; color: ${colors.font}; margin: 0 auto; max-width: 1200px; padding: 1rem 2rem; }
h1, h2, h3 { font-weight: 500; }
.plot { height: 600px; }
table.summary { border-collapse: collapse; width: 100%; }
table.summary th, table.summary td { padding: 0.25rem 0.75rem; border-bottom: 1px solid ${colors.grid}; text-align: left; }
table.summary td.amount { text-align: right; font-variant-numeric: tabular-nums; }
tr.overall, tr.category { font-weight: 600; }
`
}

const BOOT_SCRIPT = `
document.querySelectorAll('script[data-figure]').forEach(function (node) {
  var figure = JSON.parse(node.textContent);
  Plotly.newPlot(node.getAttribute('data-figure'), figure.data, figure.layout, { responsive: true, displaylogo: false });
});
`

/**
 * Builds the complete, self-describing report document.
 */
export const renderReportHtml = (page: ReportPage): string =>
  [
    `<!DOCTYPE html>`,
    `<html lang="en">`,
    `<head>`,
    `<meta charset="utf-8">`,
    `<title>${escapeHtml(page.title)}</title>`,
    `<script src="${PLOTLY_CDN_URL}"></script>`,
    `<style>${pageStyles(page.theme)}</style>`,
    `</head>`,
    `<body>`,
    `<header>`,
    `<h1>${escapeHtml(page.title)}</h1>`,
    `<p>Generated on ${escapeHtml(page.generatedOn)} from transactions between ${escapeHtml(page.range.min)} and ${escapeHtml(page.range.max)}</p>`,
    `</header>`,
    renderChartSection('Overview', 'overview', page.overview, page.theme),
    `<section>`,
    `<h2>Expenses per year</h2>`,
    renderSummaryTable(page.expenseTree, page.years, page.currency),
    `</section>`,
    renderChartSection('Category details', 'detail', page.categoryDetails, page.theme),
    renderChartSection('Average monthly expense per year', 'average', page.categoryAverages, page.theme),
    `<script>${BOOT_SCRIPT}</script>`,
    `</body>`,
    `</html>`,
    '',
  ].join('\n')

/**
 * Writes the report as `<outputDir>/<YYYY-MM-DD>-report.html` and returns
 * the path.
 */
export const writeReport = async (html: string, outputDir: string, now: Date): Promise<string> => {
  await mkdir(outputDir, { recursive: true })
  const file = join(outputDir, `${formatLocalDate(now)}-report.html`)
  await writeFile(file, html, 'utf-8')
  return file
}
