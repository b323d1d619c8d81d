/**
 * store.ts
 *
 * Simple in-memory client state shape used across the UI. Not reactive: the
 * application mutates `state` directly and components read from it.
 */

import type {ImportResult} from "../../../shared/types/collection.js";

export type CardsViewState = {
    q: string;
    type: string;
    rarity: string;
    set: string;
    owned: "all" | "owned" | "missing";
    page: number;
};

export type AppState = {
    // Survives hash navigation so the listing reopens where the user left it
    cardsView: CardsViewState;
    lastImport?: ImportResult;
};

export function defaultCardsView(): CardsViewState {
    return {q: "", type: "", rarity: "", set: "", owned: "all", page: 0};
}

export const state: AppState = {
    cardsView: defaultCardsView(),
};
