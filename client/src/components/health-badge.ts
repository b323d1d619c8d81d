/**
 * health-badge.ts
 *
 * Small system health indicator that polls the backend health endpoint and
 * shows a status dialog. A dead backend turns the dot red; nothing retries
 * faster than the poll interval.
 */

import {fetchHealth, type HealthPayload} from "../net/api";
import {debug} from "../core/log";

type HealthView = {server: HealthPayload | {ok: false; error: string}};

customElements.define("health-badge", class extends HTMLElement {
    private intervalMs = 10_000;
    private poll?: number;
    private busy = false;
    private lastTs: number | null = null;
    private view: HealthView | null = null;

    connectedCallback() {
        this.render();
        this.bind();
        void this.tick();
        this.poll = window.setInterval(() => void this.tick(), this.intervalMs);
    }

    disconnectedCallback() {
        if (this.poll) clearInterval(this.poll);
    }

    private $<T extends HTMLElement = HTMLElement>(sel: string) {
        return this.querySelector<T>(sel);
    }

    private fmt(ts: number | null) {
        return ts ? new Date(ts).toLocaleString() : "–";
    }

    private setBusy(b: boolean) {
        this.busy = b;
        this.$("#spin-health")?.classList.toggle("hidden", !b);
        const re = this.$<HTMLButtonElement>("#dlg-recheck");
        if (re) re.disabled = b;
    }

    private async tick() {
        if (this.busy) return;
        this.setBusy(true);
        try {
            const server = await fetchHealth();
            this.view = {server};
        } catch (e) {
            debug("[health-badge] health check failed", e);
            this.view = {server: {ok: false, error: e instanceof Error ? e.message : String(e)}};
        } finally {
            this.lastTs = Date.now();
            this.setBusy(false);
        }
        this.setDot(this.view?.server.ok ?? false);
        if (this.$<HTMLDialogElement>("#dlg")?.open) this.fillDialog();
    }

    private setDot(ok: boolean) {
        const dot = this.$("#dot");
        if (!dot) return;
        dot.className = ok
            ? "inline-block size-[0.75em] rounded-full bg-green-500 align-middle"
            : "inline-block size-[0.75em] rounded-full bg-red-500 align-middle";
        const btn = this.$("#btn-health");
        btn?.classList.remove("border-green-400", "border-red-400");
        btn?.classList.add(ok ? "border-green-400" : "border-red-400");
    }

    private fillDialog() {
        const server = this.view?.server;
        const summary = this.$("#dlg-health-summary");
        if (summary) summary.textContent = server?.ok ? "healthy" : "unhealthy";
        const last = this.$("#dlg-health-last");
        if (last) last.textContent = this.fmt(this.lastTs);
        const body = this.$("#dlg-body");
        if (body) body.textContent = JSON.stringify(server ?? {}, null, 2);
    }

    private bind() {
        const dlg = this.$<HTMLDialogElement>("#dlg");
        this.$("#btn-health")?.addEventListener("click", () => {
            if (dlg && !dlg.open) dlg.showModal();
            this.fillDialog();
        });
        this.$("#dlg-close")?.addEventListener("click", () => dlg?.close());
        this.$("#dlg-recheck")?.addEventListener("click", () => void this.tick());
    }

    private render() {
        this.innerHTML = `
<div class="relative text-[1em]">
  <button id="btn-health"
    class="flex items-center justify-center size-[2.4em] leading-none
           rounded-full border transition-colors bg-white shadow
           hover:shadow-md focus:outline-none focus:ring-2 focus:ring-blue-400
           border-gray-200"
    title="Backend health">
    <span id="dot" class="inline-block size-[0.75em] rounded-full bg-gray-400"></span>
  </button>

  <div id="spin-health"
       class="absolute -top-[0.25em] -left-[0.25em] size-[1em]
              border-[0.15em] border-gray-300 border-t-gray-600
              rounded-full animate-spin hidden"></div>
</div>

<dialog id="dlg" class="rounded-2xl p-0">
  <div class="card">
    <div class="flex items-center justify-between mb-3">
      <h2 class="text-lg font-semibold">System Status</h2>
      <button id="dlg-close" class="btn text-sm">Close</button>
    </div>

    <div class="mb-4">
      <div class="flex items-center gap-3 mb-2 text-sm">
        <span class="pill">Server</span>
        <span id="dlg-health-summary" class="text-gray-700">checking…</span>
      </div>
      <pre id="dlg-body" class="mono bg-gray-50 border border-gray-100 rounded-md p-2 max-h-[50vh] overflow-auto">–</pre>
    </div>

    <div class="flex items-center gap-3 text-sm">
      <span class="text-gray-600">last: <span id="dlg-health-last">–</span></span>
      <button id="dlg-recheck" class="btn text-sm">Recheck</button>
    </div>
  </div>
</dialog>
`;
    }
});
