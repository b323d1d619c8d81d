/**
 * import-screen.ts
 *
 * CSV upload screen registered as `<import-screen>`. The user picks a file
 * (or pastes the sheet), sees the first lines as a preview and sends it to
 * the backend. The result lists created/updated/skipped counts and every
 * rejected row with its line number.
 */

import "../components/app-footer";

import type {ImportResult} from "../../../shared/types/collection.js";
import {error, info} from "../core/log";
import {decodeSheet, escapeHtml, previewRows, rowErrorText, summarizeImport} from "../core/format";
import {state} from "../core/store";
import {ApiError, importCsv} from "../net/api";

customElements.define(
    "import-screen",
    class extends HTMLElement {
        // text shown in the editor and the preview
        private csv = "";
        // bytes of the picked file; cleared once the text is edited by hand
        private bytes: ArrayBuffer | null = null;
        private fileName: string | null = null;
        private busy = false;
        private loadError: string | null = null;
        private result: ImportResult | null = state.lastImport ?? null;

        connectedCallback() {
            this.render();
        }

        private $<T extends HTMLElement = HTMLElement>(sel: string) {
            return this.querySelector<T>(sel);
        }

        private async readFile(file: File) {
            try {
                this.bytes = await file.arrayBuffer();
                this.csv = decodeSheet(this.bytes);
                this.fileName = file.name;
                this.loadError = null;
            } catch (e) {
                error("[import-screen] could not read file", e);
                this.loadError = "Could not read the selected file.";
            }
            this.render();
        }

        private async submit() {
            if (this.busy || this.csv.trim() === "") return;
            this.busy = true;
            this.loadError = null;
            this.render();
            try {
                const result = await importCsv(this.bytes ?? this.csv);
                info("[import-screen] import finished", summarizeImport(result));
                this.result = result;
                state.lastImport = result;
            } catch (e) {
                error("[import-screen] import failed", e);
                this.loadError = e instanceof ApiError ? e.message : "Import failed.";
            } finally {
                this.busy = false;
                this.render();
            }
        }

        private renderPreview() {
            const rows = previewRows(this.csv);
            if (rows.length === 0) return "";
            const [header = [], ...body] = rows;
            return `
    <div class="w-full overflow-auto mb-3">
      <table class="text-xs border border-gray-200 w-full">
        <thead class="bg-gray-50">
          <tr>${header.map((h) => `<th class="px-2 py-1 text-left">${escapeHtml(h)}</th>`).join("")}</tr>
        </thead>
        <tbody>
          ${body.map((row) => `<tr>${row.map((c) => `<td class="px-2 py-1 border-t border-gray-100">${escapeHtml(c)}</td>`).join("")}</tr>`).join("")}
        </tbody>
      </table>
    </div>`;
        }

        private renderResult() {
            const r = this.result;
            if (!r) return "";
            return `
    <div class="card p-4 w-full">
      <h2 class="font-semibold text-gray-800 mb-2">Last import</h2>
      <p id="import-summary" class="text-sm text-gray-700 mb-2">${escapeHtml(summarizeImport(r))}</p>
      ${r.errors.length === 0
                ? `<p class="text-xs text-green-700">Every row was accepted.</p>`
                : `<ul id="import-errors" class="text-xs text-red-600 list-disc pl-5 max-h-64 overflow-auto">
          ${r.errors.map((e) => `<li>${escapeHtml(rowErrorText(e))}</li>`).join("")}
        </ul>`}
    </div>`;
        }

        private render() {
            this.innerHTML = `
<div class="max-w-3xl mx-auto p-4 flex flex-col gap-3">
  <h1 class="text-lg font-semibold text-gray-800">Import cards</h1>
  <p class="text-xs text-gray-500">
    CSV with at least Name, Type and Rarity columns. Imagem, Set, Number and an id column are optional.
  </p>

  ${this.loadError ? `<div class="text-xs text-red-600">${escapeHtml(this.loadError)}</div>` : ""}

  <input id="file" type="file" accept=".csv,text/csv" class="text-sm"/>
  ${this.fileName ? `<div class="text-xs text-gray-500">Selected: ${escapeHtml(this.fileName)}</div>` : ""}

  <textarea id="paste" rows="6" class="mono text-xs border border-gray-200 rounded-md p-2"
            placeholder="…or paste the sheet here">${escapeHtml(this.csv)}</textarea>

  <div id="preview">${this.renderPreview()}</div>

  <div>
    <button id="btn-import" class="btn btn-primary" ${this.busy || this.csv.trim() === "" ? "disabled" : ""}>
      ${this.busy ? "Importing…" : "Import"}
    </button>
  </div>

  ${this.renderResult()}
  <app-footer></app-footer>
</div>
`;
            this.bind();
        }

        private bind() {
            const file = this.$<HTMLInputElement>("#file");
            file?.addEventListener("change", () => {
                const picked = file.files?.[0];
                if (picked) void this.readFile(picked);
            });

            const paste = this.$<HTMLTextAreaElement>("#paste");
            paste?.addEventListener("input", () => {
                this.csv = paste.value;
                this.bytes = null;
                this.fileName = null;
                const preview = this.$("#preview");
                if (preview) preview.innerHTML = this.renderPreview();
                const btn = this.$<HTMLButtonElement>("#btn-import");
                if (btn) btn.disabled = this.csv.trim() === "";
            });

            this.$("#btn-import")?.addEventListener("click", () => void this.submit());
        }
    }
);
