import { useLocale } from "../../lib/useLocale";
import { IncidentRows } from "./IncidentRows";
import { FILTER_FIELDS, type ReportRow } from "./report_row";
import { REPORT_STYLES } from "./styles";

export type ReportDocumentProps = {
  title: string;
  rows: readonly ReportRow[];
  /** Already formatted generation time. */
  generatedAt: string;
  script: string;
};

export function ReportDocument(props: ReportDocumentProps) {
  const { t, currentLocale } = useLocale();
  const count = props.rows.length;

  return (
    <html lang={currentLocale}>
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{`${props.title} (${count})`}</title>
        <style dangerouslySetInnerHTML={{ __html: REPORT_STYLES }} />
      </head>
      <body>
        <header className="report-header">
          <h1>{props.title}</h1>
          <p className="summary">{t("report.summary", { count, timestamp: props.generatedAt })}</p>
        </header>

        <div className="toolbar">
          <button type="button" id="expand-all">
            {t("toolbar.expandAll")}
          </button>
          <button type="button" id="collapse-all">
            {t("toolbar.collapseAll")}
          </button>
          {FILTER_FIELDS.map((field) => (
            <label key={field} className="filter">
              <span>{t(`column.${field}`)}</span>
              <select data-filter={field}>
                <option value="">{t("filter.all")}</option>
              </select>
            </label>
          ))}
          <button type="button" id="reset-filters">
            {t("toolbar.resetFilters")}
          </button>
          <span id="visible-count" aria-live="polite"></span>
        </div>

        <table className="incident-table">
          <thead>
            <tr>
              <th scope="col"></th>
              <th scope="col">{t("column.id")}</th>
              <th scope="col">{t("column.title")}</th>
              <th scope="col">{t("column.affectedUser")}</th>
              <th scope="col">{t("column.assignedTo")}</th>
              <th scope="col">{t("column.created")}</th>
              <th scope="col">{t("column.status")}</th>
              <th scope="col">{t("column.classification")}</th>
              <th scope="col">{t("column.tierQueue")}</th>
              <th scope="col">{t("column.related")}</th>
            </tr>
          </thead>
          <tbody>
            {props.rows.map((row) => (
              <IncidentRows key={row.incident.id} row={row} />
            ))}
          </tbody>
        </table>
        {count === 0 ? (
          <p className="empty-state">{t("report.empty")}</p>
        ) : null}

        <script dangerouslySetInnerHTML={{ __html: props.script }} />
      </body>
    </html>
  );
}
