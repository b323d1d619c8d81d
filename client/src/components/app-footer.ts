/**
 * app-footer.ts
 *
 * Small footer custom element shown under every screen.
 */

customElements.define(
    "app-footer",
    class extends HTMLElement {
        connectedCallback() {
            this.innerHTML = `
        <footer
          class="mt-8 mb-2 text-center text-xs text-gray-500
                 opacity-70 select-none">
          Card Collection · data stays on this machine
        </footer>
      `;
        }
    }
);
