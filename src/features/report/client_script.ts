import type { Language } from "../../lib/schemas";
import { COLLAPSED_GLYPH, EXPANDED_GLYPH } from "./report_row";

export type ClientScriptConfig = {
  language: Language;
  labels: {
    /** Label of the sentinel option that disables a filter. */
    all: string;
    /** Count line; `{visible}` and `{total}` are substituted in the browser. */
    showing: string;
  };
};

export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

// Row state lives in the DOM only: a master row's toggle owns aria-expanded,
// and its detail row is always the next sibling.
const SCRIPT_BODY = `
  var COLLAPSED = config.glyphs.collapsed;
  var EXPANDED = config.glyphs.expanded;

  function toArray(list) {
    return Array.prototype.slice.call(list);
  }

  function masterRows() {
    return toArray(document.querySelectorAll("tr.incident-row"));
  }

  function filterSelects() {
    return toArray(document.querySelectorAll("select[data-filter]"));
  }

  function toggleOf(row) {
    return row.querySelector(".row-toggle");
  }

  function isExpanded(row) {
    var toggle = toggleOf(row);
    return !!toggle && toggle.getAttribute("aria-expanded") === "true";
  }

  function setExpanded(row, expanded) {
    var detail = row.nextElementSibling;
    var toggle = toggleOf(row);
    if (detail) detail.hidden = !expanded;
    if (toggle) {
      toggle.setAttribute("aria-expanded", expanded ? "true" : "false");
      toggle.textContent = expanded ? EXPANDED : COLLAPSED;
    }
  }

  function normalize(value) {
    return (value || "").trim().toLowerCase();
  }

  function addOption(select, value, label) {
    var option = document.createElement("option");
    option.value = value;
    option.textContent = label;
    select.appendChild(option);
  }

  function populateFilters() {
    var rows = masterRows();
    filterSelects().forEach(function (select) {
      var field = select.getAttribute("data-filter");
      var values = [];
      rows.forEach(function (row) {
        var value = (row.dataset[field] || "").trim();
        if (value && values.indexOf(value) === -1) values.push(value);
      });
      values.sort(function (a, b) {
        return a.localeCompare(b, config.language);
      });
      select.textContent = "";
      addOption(select, "", config.labels.all);
      values.forEach(function (value) {
        addOption(select, value, value);
      });
      select.value = "";
    });
  }

  function updateCount(visible, total) {
    var el = document.getElementById("visible-count");
    if (!el) return;
    el.textContent = config.labels.showing
      .replace("{visible}", String(visible))
      .replace("{total}", String(total));
  }

  function applyFilters() {
    var active = filterSelects()
      .map(function (select) {
        return { field: select.getAttribute("data-filter"), value: normalize(select.value) };
      })
      .filter(function (f) {
        return f.value !== "";
      });
    var rows = masterRows();
    var visible = 0;
    rows.forEach(function (row) {
      var show = active.every(function (f) {
        return normalize(row.dataset[f.field]) === f.value;
      });
      row.hidden = !show;
      if (show) visible++;
      else setExpanded(row, false);
    });
    updateCount(visible, rows.length);
  }

  function resetFilters() {
    filterSelects().forEach(function (select) {
      select.value = "";
    });
    applyFilters();
  }

  function onClick(event) {
    var target = event.target;
    if (!(target instanceof Element)) return;

    var toggle = target.closest(".row-toggle");
    if (toggle) {
      var row = toggle.closest("tr");
      if (row) setExpanded(row, !isExpanded(row));
      return;
    }
    if (target.closest("#expand-all")) {
      // A hidden row's detail would show without its master row.
      masterRows().forEach(function (row) {
        if (!row.hidden) setExpanded(row, true);
      });
      return;
    }
    if (target.closest("#collapse-all")) {
      masterRows().forEach(function (row) {
        setExpanded(row, false);
      });
      return;
    }
    if (target.closest("#reset-filters")) resetFilters();
  }

  function init() {
    populateFilters();
    filterSelects().forEach(function (select) {
      select.addEventListener("change", applyFilters);
    });
    document.addEventListener("click", onClick);
    applyFilters();
  }

  if (document.readyState === "loading") document.addEventListener("DOMContentLoaded", init);
  else init();
`;

export function buildClientScript(config: ClientScriptConfig): string {
  const embedded = {
    ...config,
    glyphs: { collapsed: COLLAPSED_GLYPH, expanded: EXPANDED_GLYPH },
  };
  return `(function () {\n  "use strict";\n  var config = ${serializeForScript(embedded)};\n${SCRIPT_BODY}})();\n`;
}
