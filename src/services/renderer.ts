import { promises as fs } from 'node:fs';
import path from 'node:path';
import { DEFAULT_SCORING_OPTIONS } from '../constants/scoring.js';
import { CRITICAL_THEMES, themeLabel } from '../constants/taxonomy.js';
import { PipelineError } from '../errors.js';
import { logger } from '../logger.js';
import type { RankedArticle, ThemeId } from '../types.js';
import { normalizeDate, publishedDay } from '../utils/date.js';

/**
 * Static dashboard: one self-contained index.html with the top-N list, the 7-day history,
 * client-side filters (search, day, themes) and two Chart.js charts loaded from a CDN.
 */

const CHART_JS_URL = 'https://cdn.jsdelivr.net/npm/chart.js@4.4.0/dist/chart.umd.min.js';
const CHART_DAYS = 7;
const PREVIEW_CHARS = 300;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface DashboardOptions {
  now?: Date;
  topN?: number;
}

export interface ChartData {
  days: string[]; // YYYY-MM-DD, oldest first
  perDay: number[];
  themes: ThemeId[]; // first-seen order
  perTheme: number[];
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

// JSON inside <script> must not be able to close the tag
function scriptJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function scoreColor(score: number): string {
  if (score >= 70) return '#3fb950';
  if (score >= 50) return '#d29922';
  if (score >= 30) return '#f0883e';
  return '#8b949e';
}

function lastDays(now: Date, count: number): string[] {
  const days: string[] = [];
  for (let i = count - 1; i >= 0; i--) {
    days.push(normalizeDate(new Date(now.getTime() - i * MS_PER_DAY)));
  }
  return days;
}

/**
 * Articles per published day over the last seven days, and theme hit counts over everything.
 */
export function buildChartData(articles: readonly RankedArticle[], now: Date): ChartData {
  const days = lastDays(now, CHART_DAYS);
  const perDay = new Map(days.map((d) => [d, 0]));
  const perTheme = new Map<ThemeId, number>();

  for (const article of articles) {
    const day = publishedDay(article.published_date);
    const count = perDay.get(day);
    if (count !== undefined) perDay.set(day, count + 1);
    for (const theme of article.themes) {
      perTheme.set(theme, (perTheme.get(theme) ?? 0) + 1);
    }
  }

  return {
    days,
    perDay: days.map((d) => perDay.get(d) ?? 0),
    themes: [...perTheme.keys()],
    perTheme: [...perTheme.values()],
  };
}

export function renderCard(article: RankedArticle): string {
  const score = article.score_normalized;
  const color = scoreColor(score);
  const day = publishedDay(article.published_date);
  const keywords = article.matched_keywords;

  const preview =
    escapeHtml(article.content.slice(0, PREVIEW_CHARS)) + (article.content.length > PREVIEW_CHARS ? '&#8230;' : '');
  const tooltip = [
    `Score: ${score.toFixed(2)}`,
    `Threshold: ${article.alert_threshold.toFixed(1)}`,
    `Sentiment: ${article.sentiment_label}`,
    `Keywords: ${keywords.length ? keywords.slice(0, 8).join(', ') : '-'}`,
  ].join(' | ');
  const searchable = `${article.title} ${article.content.slice(0, 600)}`.toLowerCase().replace(/\s+/g, ' ').slice(0, 800);

  const themeTags = article.themes.map((t) => `<span class="theme-tag">${escapeHtml(themeLabel(t))}</span>`).join('');
  const alertBadge = article.is_relevant ? '<span class="alert-badge">ALERT</span>' : '';
  const keywordHint = keywords.length ? `<span class="kw-hint">${escapeHtml(keywords.slice(0, 5).join(', '))}</span>` : '';

  return `<article class="card${article.is_relevant ? ' card-alert' : ''}" data-score="${score.toFixed(2)}" data-date="${day}" data-themes="${escapeHtml(article.themes.join(','))}" data-text="${escapeHtml(searchable)}">
  <div class="card-header">
    <span class="source-badge">${escapeHtml(article.source || 'Unknown')}</span>
    <span class="score-pill" style="color:${color};border-color:${color}" title="${escapeHtml(tooltip)}">${score.toFixed(1)}</span>
    ${themeTags}
    ${alertBadge}
  </div>
  <h3 class="card-title"><a href="${escapeHtml(article.link || '#')}" target="_blank" rel="noopener">${escapeHtml(article.title)}</a></h3>
  <p class="preview card-detail">${preview}</p>
  <div class="card-footer card-detail">
    <time datetime="${day}">${escapeHtml(article.published_date.slice(0, 25) || 'Unknown date')}</time>
    ${keywordHint}
  </div>
</article>`;
}

const STYLE = `
:root{--bg:#0d1117;--surface:#161b22;--surface2:#1c2128;--border:#30363d;--text:#c9d1d9;--muted:#8b949e;--accent:#58a6ff;--red:#f85149;--alert:#ff7b72;--tag-bg:#1f2937}
*{box-sizing:border-box;margin:0;padding:0}
body{background:var(--bg);color:var(--text);font-family:-apple-system,BlinkMacSystemFont,"Segoe UI",sans-serif;font-size:14px;line-height:1.6}
header{background:var(--surface);border-bottom:1px solid var(--border);padding:12px 20px;display:flex;align-items:center;gap:10px;position:sticky;top:0;flex-wrap:wrap}
header h1{font-size:17px;color:var(--accent)}
.header-meta{color:var(--muted);font-size:11px;margin-left:auto;text-align:right}
.btn{background:var(--tag-bg);color:var(--text);border:1px solid var(--border);padding:5px 12px;border-radius:6px;cursor:pointer;font-size:12px}
.btn.on{background:var(--accent);color:#000}
main{max-width:980px;margin:0 auto;padding:20px 16px}
.dashboard{display:grid;grid-template-columns:repeat(auto-fit,minmax(130px,1fr));gap:10px;margin-bottom:14px}
.stat-card,.chart-box{background:var(--surface);border:1px solid var(--border);border-radius:8px;padding:11px 14px}
.stat-label,.chart-title,.section-title{font-size:10px;text-transform:uppercase;color:var(--muted);letter-spacing:.05em}
.stat-value{font-size:22px;font-weight:700;color:var(--accent)}
.charts-row{display:grid;grid-template-columns:1fr 1fr;gap:12px;margin-bottom:14px}
@media(max-width:600px){.charts-row{grid-template-columns:1fr}}
.chart-box canvas{max-height:155px}
.toolbar{background:var(--surface2);border:1px solid var(--border);border-radius:8px;padding:12px 14px;margin-bottom:14px;display:flex;flex-direction:column;gap:9px}
.toolbar-row{display:flex;gap:8px;align-items:center;flex-wrap:wrap}
.search-input,.date-select{background:var(--bg);color:var(--text);border:1px solid var(--border);border-radius:6px;padding:5px 10px}
.search-input{flex:1;min-width:160px}
.result-count{font-size:11px;color:var(--muted);margin-left:auto}
.filter-btn{background:var(--tag-bg);color:var(--muted);border:1px solid var(--border);padding:3px 10px;border-radius:20px;cursor:pointer;font-size:11px}
.filter-btn.on{color:var(--red);border-color:var(--red)}
.card{background:var(--surface);border:1px solid var(--border);border-radius:8px;padding:14px;margin-bottom:10px}
.card-alert{border-color:var(--alert);animation:pulse 2.5s ease-in-out infinite}
@keyframes pulse{0%,100%{box-shadow:0 0 0 1px rgba(255,123,114,.15)}50%{box-shadow:0 0 0 3px rgba(255,123,114,.35)}}
.card-header{display:flex;align-items:center;gap:7px;margin-bottom:7px;flex-wrap:wrap}
.source-badge,.theme-tag,.alert-badge,.score-pill{font-size:10px;padding:2px 7px;border-radius:4px;border:1px solid var(--border)}
.score-pill{font-weight:700;cursor:help}
.theme-tag{color:var(--red)}
.alert-badge{color:var(--alert);font-weight:700}
.card-title a{color:var(--text);text-decoration:none}
.preview{color:var(--muted);font-size:12px;margin:5px 0 7px}
.card-footer{font-size:11px;color:var(--muted);display:flex;gap:12px;flex-wrap:wrap}
.kw-hint{color:var(--accent);font-size:10px}
.compact-mode .card-detail,.hidden{display:none!important}
.view{display:none}.view.active{display:block}
`;

const SCRIPT = `
let currentView = 'top';
const activeThemes = new Set();

function setView(v) {
  currentView = v;
  document.getElementById('view-top').classList.toggle('active', v === 'top');
  document.getElementById('view-all').classList.toggle('active', v === 'all');
  document.getElementById('viewBtn').classList.toggle('on', v === 'top');
  document.getElementById('viewAllBtn').classList.toggle('on', v === 'all');
  applyFilters();
}

function toggleCompact() {
  const on = document.body.classList.toggle('compact-mode');
  document.getElementById('compactBtn').classList.toggle('on', on);
}

function toggleTheme(btn) {
  const theme = btn.dataset.theme;
  if (activeThemes.has(theme)) activeThemes.delete(theme);
  else activeThemes.add(theme);
  btn.classList.toggle('on', activeThemes.has(theme));
  document.getElementById('themeAll').classList.toggle('on', activeThemes.size === 0);
  applyFilters();
}

function clearThemes() {
  activeThemes.clear();
  document.querySelectorAll('.filter-btn[data-theme]').forEach((b) => b.classList.remove('on'));
  document.getElementById('themeAll').classList.add('on');
  applyFilters();
}

function applyFilters() {
  const query = document.getElementById('searchInput').value.toLowerCase().trim();
  const day = document.getElementById('dateSelect').value;
  const cards = document.getElementById(currentView === 'top' ? 'cards-top' : 'cards-all').querySelectorAll('.card');
  let visible = 0;
  cards.forEach((card) => {
    const themes = (card.dataset.themes || '').split(',');
    const show =
      (!query || (card.dataset.text || '').includes(query)) &&
      (!day || card.dataset.date === day) &&
      (activeThemes.size === 0 || themes.some((t) => activeThemes.has(t)));
    card.classList.toggle('hidden', !show);
    if (show) visible++;
  });
  document.getElementById('resultCount').textContent = visible + (visible === 1 ? ' article' : ' articles');
}

const axis = { grid: { color: '#30363d' }, ticks: { color: '#8b949e', font: { size: 10 } } };
const chartData = JSON.parse(document.getElementById('chart-data').textContent);

new Chart(document.getElementById('chartDays'), {
  type: 'bar',
  data: { labels: chartData.dayLabels, datasets: [{ data: chartData.perDay, backgroundColor: 'rgba(88,166,255,0.45)', borderColor: '#58a6ff', borderWidth: 1 }] },
  options: { plugins: { legend: { display: false } }, scales: { x: axis, y: { ...axis, ticks: { ...axis.ticks, stepSize: 1 } } } },
});

if (chartData.perTheme.some((v) => v > 0)) {
  new Chart(document.getElementById('chartThemes'), {
    type: 'doughnut',
    data: { labels: chartData.themeLabels, datasets: [{ data: chartData.perTheme, borderWidth: 0 }] },
    options: { plugins: { legend: { position: 'right', labels: { color: '#8b949e', font: { size: 10 }, boxWidth: 12 } } } },
  });
} else {
  document.getElementById('chartThemes').insertAdjacentHTML('afterend', '<p class="result-count">No critical themes detected</p>');
}

applyFilters();
`;

/**
 * The whole page. `all` is the scored corpus (any order), `top` the ranked top-N.
 */
export function renderDashboard(
  all: readonly RankedArticle[],
  top: readonly RankedArticle[],
  opts: DashboardOptions = {},
): string {
  const now = opts.now ?? new Date();
  const topN = opts.topN ?? top.length;
  const threshold = top[0]?.alert_threshold ?? all[0]?.alert_threshold ?? DEFAULT_SCORING_OPTIONS.defaultThreshold;
  const alertCount = all.filter((a) => a.is_relevant).length;
  const avgScore = all.length ? all.reduce((sum, a) => sum + a.score_normalized, 0) / all.length : 0;
  const updated = `${now.toISOString().slice(0, 16).replace('T', ' ')} UTC`;

  const chart = buildChartData(all, now);
  const chartJson = scriptJson({
    dayLabels: chart.days.map((d) => d.slice(5)),
    perDay: chart.perDay,
    themeLabels: chart.themes.map(themeLabel),
    perTheme: chart.perTheme,
  });

  const dayOptions = [...chart.days]
    .reverse()
    .map((d) => `<option value="${d}">${d}</option>`)
    .join('\n        ');
  const themeButtons = CRITICAL_THEMES.map(
    (t) => `<button class="filter-btn" data-theme="${escapeHtml(t.id)}" onclick="toggleTheme(this)">${escapeHtml(t.label)}</button>`,
  ).join('\n      ');

  const topCards = top.map(renderCard).join('\n');
  const allCards = [...all]
    .sort((a, b) => b.score_normalized - a.score_normalized)
    .map(renderCard)
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Macro Pulse - ${updated}</title>
  <script src="${CHART_JS_URL}"></script>
  <style>${STYLE}</style>
</head>
<body>
<header>
  <h1>Macro Pulse</h1>
  <button class="btn on" id="viewBtn" onclick="setView('top')">Top ${topN}</button>
  <button class="btn" id="viewAllBtn" onclick="setView('all')">7-day history</button>
  <button class="btn" id="compactBtn" onclick="toggleCompact()">Compact</button>
  <div class="header-meta">Updated ${updated}<br>Alert threshold ${threshold.toFixed(1)} · ${alertCount} alerts</div>
</header>
<main>
  <div class="dashboard">
    <div class="stat-card"><div class="stat-label">Articles (7 days)</div><div class="stat-value" id="stat-articles">${all.length}</div></div>
    <div class="stat-card"><div class="stat-label">Top selected</div><div class="stat-value" id="stat-top">${top.length}</div></div>
    <div class="stat-card"><div class="stat-label">Critical alerts</div><div class="stat-value" id="stat-alerts">${alertCount}</div></div>
    <div class="stat-card"><div class="stat-label">Average score</div><div class="stat-value" id="stat-average">${avgScore.toFixed(1)}</div></div>
    <div class="stat-card"><div class="stat-label">Alert threshold</div><div class="stat-value" id="stat-threshold">${threshold.toFixed(1)}</div></div>
  </div>
  <div class="charts-row">
    <div class="chart-box"><div class="chart-title">Articles per day</div><canvas id="chartDays"></canvas></div>
    <div class="chart-box"><div class="chart-title">Critical themes</div><canvas id="chartThemes"></canvas></div>
  </div>
  <div class="toolbar">
    <div class="toolbar-row">
      <input class="search-input" id="searchInput" type="text" placeholder="Fed, oil, inflation..." oninput="applyFilters()">
      <select class="date-select" id="dateSelect" onchange="applyFilters()">
        <option value="">All days</option>
        ${dayOptions}
      </select>
      <span class="result-count" id="resultCount"></span>
    </div>
    <div class="toolbar-row">
      <button class="filter-btn on" id="themeAll" onclick="clearThemes()">All themes</button>
      ${themeButtons}
    </div>
  </div>
  <div class="view active" id="view-top">
    <div class="section-title">Top ${topN} articles</div>
    <div id="cards-top">${topCards}</div>
  </div>
  <div class="view" id="view-all">
    <div class="section-title">Last 7 days (${all.length} articles)</div>
    <div id="cards-all">${allCards}</div>
  </div>
</main>
<script type="application/json" id="chart-data">${chartJson}</script>
<script>${SCRIPT}</script>
</body>
</html>`;
}

/**
 * Write the page next to a temp file and rename it into place.
 */
export async function writeDashboard(filePath: string, html: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, html, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw new PipelineError(`Failed to write dashboard to ${filePath}`, 'RENDER_FAILED', err);
  }
  logger.info({ filePath, bytes: Buffer.byteLength(html) }, 'Dashboard written');
}
