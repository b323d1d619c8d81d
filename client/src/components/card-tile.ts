/**
 * card-tile.ts
 *
 * One card in the listing grid: thumbnail (or a placeholder when the image
 * did not resolve), name, type/rarity line and an ownership toggle. The tile
 * only dispatches `card:toggle`; the owning screen talks to the backend and
 * hands the updated card back through the `card` property.
 */

import type {CardView} from "../../../shared/types/card.js";
import {escapeHtml} from "../core/format";

export type CardToggleDetail = {id: string; owned: boolean};

export class CardTile extends HTMLElement {
    private data: CardView | null = null;
    private pending = false;

    set card(value: CardView) {
        this.data = value;
        this.pending = false;
        this.render();
    }

    get card(): CardView | null {
        return this.data;
    }

    set busy(value: boolean) {
        this.pending = value;
        const btn = this.querySelector<HTMLButtonElement>("button[data-toggle]");
        if (btn) btn.disabled = value;
    }

    connectedCallback() {
        this.render();
    }

    private render() {
        const card = this.data;
        if (!card) {
            this.innerHTML = "";
            return;
        }

        const thumb = card.thumbnailUrl
            ? `<img src="${escapeHtml(card.thumbnailUrl)}" alt="${escapeHtml(card.name)}" loading="lazy"
                    class="w-full h-40 object-contain bg-gray-50 rounded-md"/>`
            : `<div class="w-full h-40 flex items-center justify-center bg-gray-100 rounded-md text-xs text-gray-400">
                 no image
               </div>`;
        const setLine = card.setName
            ? `<div class="text-xs text-gray-400 truncate">${escapeHtml(card.setName)}${card.number ? ` · #${escapeHtml(card.number)}` : ""}</div>`
            : "";

        this.innerHTML = `
<div class="card p-3 flex flex-col gap-2 ${card.owned ? "ring-2 ring-green-400" : "opacity-80"}" data-card-id="${escapeHtml(card.id)}">
  ${thumb}
  <div class="font-medium text-gray-800 truncate" title="${escapeHtml(card.name)}">${escapeHtml(card.name)}</div>
  <div class="text-xs text-gray-500">${escapeHtml(card.type)} · ${escapeHtml(card.rarity)}</div>
  ${setLine}
  <button data-toggle class="btn text-sm ${card.owned ? "btn-primary" : "btn-secondary"}" ${this.pending ? "disabled" : ""}>
    ${card.owned ? "Owned" : "Mark owned"}
  </button>
</div>
`;
        this.querySelector("button[data-toggle]")?.addEventListener("click", () => {
            if (this.pending) return;
            const detail: CardToggleDetail = {id: card.id, owned: !card.owned};
            this.dispatchEvent(new CustomEvent<CardToggleDetail>("card:toggle", {detail, bubbles: true}));
        });
    }
}

customElements.define("card-tile", CardTile);

declare global {
    interface HTMLElementTagNameMap {
        "card-tile": CardTile;
    }
    interface HTMLElementEventMap {
        "card:toggle": CustomEvent<CardToggleDetail>;
    }
}
