/**
 * cards-screen.ts
 *
 * Catalog listing registered as `<cards-screen>`: search, type/rarity/set
 * and ownership filters fed by the backend facets, server-side paging in
 * name order, and an ownership toggle on every tile.
 */

import "../components/app-footer";
import {CardTile} from "../components/card-tile";

import type {CardFacets, CardFilters, CardView} from "../../../shared/types/card.js";
import {debug, error} from "../core/log";
import {escapeHtml, pageCount} from "../core/format";
import {defaultCardsView, state, type CardsViewState} from "../core/store";
import {ApiError, fetchCards, fetchFacets, toggleOwned} from "../net/api";

const PAGE_SIZE = 24;
const SEARCH_DEBOUNCE_MS = 250;

function toFilters(view: CardsViewState): CardFilters {
    return {
        q: view.q.trim() || undefined,
        type: view.type || undefined,
        rarity: view.rarity || undefined,
        set: view.set || undefined,
        owned: view.owned === "all" ? undefined : view.owned === "owned",
        limit: PAGE_SIZE,
        offset: view.page * PAGE_SIZE,
    };
}

function options(values: string[], selected: string, allLabel: string) {
    return [`<option value="">${allLabel}</option>`]
        .concat(values.map((v) => `<option value="${escapeHtml(v)}" ${v === selected ? "selected" : ""}>${escapeHtml(v)}</option>`))
        .join("");
}

customElements.define(
    "cards-screen",
    class extends HTMLElement {
        private view = state.cardsView;
        private facets: CardFacets = {types: [], rarities: [], sets: []};
        private cards: CardView[] = [];
        private total = 0;
        private loadError: string | null = null;
        private loading = false;
        private searchTimer?: number;
        private requestSeq = 0;

        constructor() {
            super();
            this.addEventListener("card:toggle", (e) => void this.toggle(e.detail.id));
        }

        private tileFor(id: string): CardTile | null {
            const tile = this.querySelector(`card-tile[data-id="${CSS.escape(id)}"]`);
            return tile instanceof CardTile ? tile : null;
        }

        connectedCallback() {
            this.render();
            void this.loadFacets();
            void this.load();
        }

        disconnectedCallback() {
            if (this.searchTimer) clearTimeout(this.searchTimer);
        }

        private $<T extends HTMLElement = HTMLElement>(sel: string) {
            return this.querySelector<T>(sel);
        }

        private async loadFacets() {
            try {
                this.facets = await fetchFacets();
                this.renderFilters();
            } catch (e) {
                error("[cards-screen] failed to load facets", e);
            }
        }

        private async load() {
            // responses to superseded filter states are dropped
            const seq = ++this.requestSeq;
            this.loading = true;
            this.renderGrid();
            try {
                const page = await fetchCards(toFilters(this.view));
                if (seq !== this.requestSeq) return;
                this.cards = page.cards;
                this.total = page.total;
                this.loadError = null;
                debug("[cards-screen] loaded", page.cards.length, "of", page.total);
            } catch (e) {
                if (seq !== this.requestSeq) return;
                error("[cards-screen] failed to load cards", e);
                this.cards = [];
                this.total = 0;
                this.loadError = e instanceof ApiError ? e.message : "Unable to load cards.";
            } finally {
                if (seq === this.requestSeq) {
                    this.loading = false;
                    this.renderGrid();
                }
            }
        }

        private update(patch: Partial<CardsViewState>) {
            Object.assign(this.view, patch);
            void this.load();
        }

        private async toggle(id: string) {
            const tile = this.tileFor(id);
            if (tile) tile.busy = true;
            try {
                const card = await toggleOwned(id);
                this.cards = this.cards.map((c) => (c.id === card.id ? card : c));
                // the card may no longer match an owned/missing filter
                if (this.view.owned !== "all") {
                    void this.load();
                    return;
                }
                const fresh = this.tileFor(id);
                if (fresh) fresh.card = card;
            } catch (e) {
                error("[cards-screen] toggle failed", e);
                this.loadError = e instanceof ApiError ? e.message : "Could not update ownership.";
                this.renderGrid();
            }
        }

        private renderFilters() {
            const host = this.$("#filters");
            if (!host) return;
            host.innerHTML = `
  <input id="search" class="field-input border border-gray-200 rounded-md px-2 py-1 text-sm"
         placeholder="Search by name" value="${escapeHtml(this.view.q)}"/>
  <select id="f-type" class="text-sm border border-gray-200 rounded-md px-2 py-1">${options(this.facets.types, this.view.type, "All types")}</select>
  <select id="f-rarity" class="text-sm border border-gray-200 rounded-md px-2 py-1">${options(this.facets.rarities, this.view.rarity, "All rarities")}</select>
  <select id="f-set" class="text-sm border border-gray-200 rounded-md px-2 py-1">${options(this.facets.sets, this.view.set, "All sets")}</select>
  <select id="f-owned" class="text-sm border border-gray-200 rounded-md px-2 py-1">
    <option value="all" ${this.view.owned === "all" ? "selected" : ""}>All cards</option>
    <option value="owned" ${this.view.owned === "owned" ? "selected" : ""}>Owned</option>
    <option value="missing" ${this.view.owned === "missing" ? "selected" : ""}>Missing</option>
  </select>
  <button id="btn-reset" class="btn btn-secondary text-sm">Reset</button>
`;
            this.bindFilters();
        }

        private renderGrid() {
            const host = this.$("#grid");
            if (!host) return;
            const totalPages = pageCount(this.total, PAGE_SIZE);

            host.innerHTML = `
  ${this.loadError ? `<div class="text-xs text-red-600 mb-2">${escapeHtml(this.loadError)}</div>` : ""}
  <div class="flex items-center text-xs text-gray-500 mb-2">
    <span>${this.loading ? "Loading…" : `${this.total} cards`}</span>
    <span class="ml-auto">Page ${Math.min(this.view.page + 1, totalPages)} / ${totalPages}</span>
  </div>
  <div id="tiles" class="grid grid-cols-2 sm:grid-cols-3 lg:grid-cols-4 gap-3"></div>
  ${!this.loading && this.cards.length === 0 && !this.loadError
                ? `<div class="text-sm text-gray-500 text-center py-8">No cards match your filters.</div>`
                : ""}
  <div class="flex justify-between mt-3">
    <button id="prev" class="btn btn-primary" ${this.view.page === 0 ? "disabled" : ""}>&#x25C0;</button>
    <button id="next" class="btn btn-primary" ${this.view.page >= totalPages - 1 ? "disabled" : ""}>&#x25B6;</button>
  </div>
`;
            const tiles = this.$("#tiles");
            for (const card of this.cards) {
                const tile = document.createElement("card-tile");
                tile.dataset.id = card.id;
                tile.card = card;
                tiles?.appendChild(tile);
            }

            this.$("#prev")?.addEventListener("click", () => {
                if (this.view.page > 0) this.update({page: this.view.page - 1});
            });
            this.$("#next")?.addEventListener("click", () => {
                if (this.view.page < totalPages - 1) this.update({page: this.view.page + 1});
            });
        }

        private bindFilters() {
            const search = this.$<HTMLInputElement>("#search");
            search?.addEventListener("input", () => {
                if (this.searchTimer) clearTimeout(this.searchTimer);
                this.searchTimer = window.setTimeout(() => this.update({q: search.value, page: 0}), SEARCH_DEBOUNCE_MS);
            });

            const bindSelect = (sel: string, apply: (value: string) => Partial<CardsViewState>) => {
                const el = this.$<HTMLSelectElement>(sel);
                el?.addEventListener("change", () => this.update({...apply(el.value), page: 0}));
            };
            bindSelect("#f-type", (type) => ({type}));
            bindSelect("#f-rarity", (rarity) => ({rarity}));
            bindSelect("#f-set", (set) => ({set}));
            bindSelect("#f-owned", (owned) => ({owned: owned === "owned" || owned === "missing" ? owned : "all"}));

            this.$("#btn-reset")?.addEventListener("click", () => {
                Object.assign(this.view, defaultCardsView());
                this.renderFilters();
                void this.load();
            });
        }

        private render() {
            this.innerHTML = `
<div class="max-w-5xl mx-auto p-4">
  <h1 class="text-lg font-semibold text-gray-800 mb-2">Cards</h1>
  <div id="filters" class="flex flex-wrap items-center gap-2 mb-3"></div>
  <div id="grid"></div>
  <app-footer></app-footer>
</div>
`;
            this.renderFilters();
            this.renderGrid();
        }
    }
);
