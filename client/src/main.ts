/**
 * main.ts
 *
 * Application bootstrap and hash router for the dashboard. Each route maps to
 * one screen element that is swapped into `#screen-root`; screens load their
 * own data when they connect.
 */

import "../styles/index.css";

import "./components/app-nav";
import "./components/app-footer";

import "./screens/import-screen";
import "./screens/cards-screen";
import "./screens/collection-screen";

import {debug, error} from "./core/log";

const ROUTES: Record<string, string> = {
    "#/cards": "cards-screen",
    "#/collection": "collection-screen",
    "#/import": "import-screen",
};

const DEFAULT_ROUTE = "#/cards";

function renderRoute() {
    const root = document.getElementById("screen-root");
    if (!root) {
        error("#screen-root not found");
        return;
    }
    const tag = ROUTES[window.location.hash];
    if (!tag) {
        // the hashchange event renders the default screen
        window.location.hash = DEFAULT_ROUTE;
        return;
    }
    debug("[router]", window.location.hash, "->", tag);
    root.replaceChildren(document.createElement(tag));
}

window.addEventListener("hashchange", renderRoute);
renderRoute();
