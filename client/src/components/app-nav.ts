/**
 * app-nav.ts
 *
 * Top navigation bar. Links are plain hash routes; the active one is
 * highlighted whenever the hash changes.
 */

import "./health-badge";

export const NAV_LINKS = [
    {hash: "#/cards", label: "Cards"},
    {hash: "#/collection", label: "Collection"},
    {hash: "#/import", label: "Import"},
] as const;

customElements.define(
    "app-nav",
    class extends HTMLElement {
        private onHash = () => this.highlight();

        connectedCallback() {
            this.render();
            this.highlight();
            window.addEventListener("hashchange", this.onHash);
        }

        disconnectedCallback() {
            window.removeEventListener("hashchange", this.onHash);
        }

        private highlight() {
            const current = window.location.hash || NAV_LINKS[0].hash;
            this.querySelectorAll<HTMLAnchorElement>("a[data-nav]").forEach((a) => {
                const active = a.getAttribute("href") === current;
                a.classList.toggle("pill-ok", active);
                a.setAttribute("aria-current", active ? "page" : "false");
            });
        }

        private render() {
            this.innerHTML = `
<nav class="flex items-center gap-3 px-4 py-3 bg-white shadow-sm">
  <span class="font-semibold text-gray-800 mr-4">Card Collection</span>
  ${NAV_LINKS.map((link) => `<a data-nav href="${link.hash}" class="pill">${link.label}</a>`).join("")}
  <div class="ml-auto"><health-badge></health-badge></div>
</nav>
`;
        }
    }
);
