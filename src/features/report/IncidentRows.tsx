import { Fragment } from "react";

import { displayText } from "../../lib/format";
import type { CatalogKey } from "../../lib/i18n";
import { useLocale } from "../../lib/useLocale";
import { COLLAPSED_GLYPH, type ReportRow } from "./report_row";

export const COLUMN_COUNT = 10;

/** Master row plus its hidden detail row; the detail row must stay the next sibling. */
export function IncidentRows(props: { row: ReportRow }) {
  const { t } = useLocale();
  const { incident, created, color } = props.row;
  const classification = displayText(incident.classification);
  const tierQueue = displayText(incident.tierQueue);
  const related = String(incident.relatedCount);

  const details: Array<[CatalogKey, string]> = [
    ["column.id", incident.id],
    ["column.title", incident.title],
    ["column.affectedUser", incident.affectedUser],
    ["column.assignedTo", incident.assignedTo],
    ["column.created", created],
    ["column.status", incident.status],
    ["column.classification", classification],
    ["column.tierQueue", tierQueue],
    ["column.related", related],
  ];

  return (
    <>
      <tr
        className="incident-row"
        data-classification={classification}
        data-affected-user={incident.affectedUser}
        data-assigned-to={incident.assignedTo}
        data-tier-queue={tierQueue}
      >
        <td>
          <button type="button" className="row-toggle" aria-expanded={false} aria-label={t("toolbar.toggleDetails")}>
            {COLLAPSED_GLYPH}
          </button>
        </td>
        <td className="cell-id">{incident.id}</td>
        <td className="cell-title">{incident.title}</td>
        <td>{incident.affectedUser}</td>
        <td>{incident.assignedTo}</td>
        <td className="cell-created">{created}</td>
        <td>
          <span className="status-badge" style={{ backgroundColor: color }}>
            {incident.status}
          </span>
        </td>
        <td>{classification}</td>
        <td>{tierQueue}</td>
        <td>
          <span className={incident.relatedCount === 0 ? "pill pill-zero" : "pill"}>{related}</span>
        </td>
      </tr>
      <tr className="detail-row" hidden>
        <td colSpan={COLUMN_COUNT}>
          <dl className="detail-list">
            {details.map(([key, value]) => (
              <Fragment key={key}>
                <dt>{t(key)}</dt>
                <dd>{value}</dd>
              </Fragment>
            ))}
          </dl>
        </td>
      </tr>
    </>
  );
}
