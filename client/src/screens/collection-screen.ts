/**
 * collection-screen.ts
 *
 * Collection progress registered as `<collection-screen>`: overall owned
 * percentage and breakdown tables per type, rarity and set.
 */

import "../components/app-footer";

import type {Breakdown, CollectionStats} from "../../../shared/types/collection.js";
import {error} from "../core/log";
import {escapeHtml, formatPercent} from "../core/format";
import {ApiError, fetchStats} from "../net/api";

function progressBar(percentage: number) {
    const width = Math.min(100, Math.max(0, percentage));
    return `
<div class="w-full h-2 bg-gray-100 rounded-full overflow-hidden">
  <div class="h-full bg-green-500" style="width: ${width}%"></div>
</div>`;
}

function breakdownTable(title: string, rows: Breakdown[]) {
    if (rows.length === 0) return "";
    return `
<section class="card p-4">
  <h2 class="font-semibold text-gray-800 mb-2">${title}</h2>
  <table class="w-full text-sm">
    <thead class="text-xs text-gray-500">
      <tr>
        <th class="text-left py-1">Name</th>
        <th class="text-right py-1">Owned</th>
        <th class="text-right py-1">Missing</th>
        <th class="text-right py-1">Total</th>
        <th class="text-right py-1 w-40">Progress</th>
      </tr>
    </thead>
    <tbody>
      ${rows.map((row) => `
      <tr class="border-t border-gray-100">
        <td class="py-1">${escapeHtml(row.key)}</td>
        <td class="py-1 text-right">${row.owned}</td>
        <td class="py-1 text-right">${row.missing}</td>
        <td class="py-1 text-right">${row.total}</td>
        <td class="py-1 pl-3">
          <div class="flex items-center gap-2">${progressBar(row.percentage)}<span class="text-xs w-12 text-right">${formatPercent(row.percentage)}</span></div>
        </td>
      </tr>`).join("")}
    </tbody>
  </table>
</section>`;
}

customElements.define(
    "collection-screen",
    class extends HTMLElement {
        private stats: CollectionStats | null = null;
        private loadError: string | null = null;

        connectedCallback() {
            this.render();
            void this.load();
        }

        private async load() {
            try {
                this.stats = await fetchStats();
                this.loadError = null;
            } catch (e) {
                error("[collection-screen] failed to load stats", e);
                this.stats = null;
                this.loadError = e instanceof ApiError ? e.message : "Unable to load collection stats.";
            }
            this.render();
        }

        private render() {
            const s = this.stats;
            this.innerHTML = `
<div class="max-w-4xl mx-auto p-4 flex flex-col gap-4">
  <h1 class="text-lg font-semibold text-gray-800">Collection</h1>

  ${this.loadError ? `<div class="text-xs text-red-600">${escapeHtml(this.loadError)}</div>` : ""}
  ${!s && !this.loadError ? `<div class="text-sm text-gray-500">Loading…</div>` : ""}

  ${s ? `
  <section class="card p-4">
    <div class="flex items-baseline gap-3 mb-2">
      <span id="overall-percentage" class="text-3xl font-semibold">${formatPercent(s.percentage)}</span>
      <span class="text-sm text-gray-500">${s.ownedCards} owned · ${s.missingCards} missing · ${s.totalCards} total</span>
    </div>
    ${progressBar(s.percentage)}
  </section>
  ${s.totalCards === 0 ? `<p class="text-sm text-gray-500">The catalog is empty. <a href="#/import" class="underline">Import a CSV</a> to get started.</p>` : ""}
  ${breakdownTable("By type", s.byType)}
  ${breakdownTable("By rarity", s.byRarity)}
  ${breakdownTable("By set", s.bySet)}
  ` : ""}
  <app-footer></app-footer>
</div>
`;
        }
    }
);
