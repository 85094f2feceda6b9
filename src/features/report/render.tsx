import type { ReactNode } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { I18nextProvider } from "react-i18next";

import { formatDisplayDate } from "../../lib/format";
import type { Catalog } from "../../lib/i18n";
import type { ResolvedIncident } from "../../lib/schemas";
import { buildClientScript } from "./client_script";
import { ReportDocument } from "./ReportDocument";
import { toReportRow } from "./report_row";

export type RenderReportInput = {
  /** Already filtered and sorted; rendered in this order. */
  incidents: readonly ResolvedIncident[];
  catalog: Catalog;
  title?: string;
  generatedAt: Date;
};

export function renderWithCatalog(node: ReactNode, catalog: Catalog): string {
  return renderToStaticMarkup(<I18nextProvider i18n={catalog.i18n}>{node}</I18nextProvider>);
}

export function renderReport(input: RenderReportInput): string {
  const { catalog } = input;
  const title = input.title?.trim() ? input.title : catalog.t("report.defaultTitle");
  const script = buildClientScript({
    language: catalog.language,
    labels: {
      all: catalog.t("filter.all"),
      showing: catalog.t("filter.showing", { visible: "{visible}", total: "{total}" }),
    },
  });

  const markup = renderWithCatalog(
    <ReportDocument
      title={title}
      rows={input.incidents.map(toReportRow)}
      generatedAt={formatDisplayDate(input.generatedAt)}
      script={script}
    />,
    catalog
  );
  return `<!DOCTYPE html>\n${markup}`;
}
