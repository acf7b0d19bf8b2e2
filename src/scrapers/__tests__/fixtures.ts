/** Canned portal markup shared by the scraper tests. */

const HEADER =
  '<tr><th>Deptt./Rly. Unit</th><th>Tender No</th><th>Title</th><th>Status</th>' +
  '<th>Work Area</th><th>Due Date/Time</th><th>Due Days</th><th>Actions</th></tr>';

export function row(cells: string[]): string {
  return `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`;
}

export const viewIcon = (target: string) =>
  `<a href="#" onclick="postRequestNewWindow('${target}')"><img title="View Tender Details"></a>`;

/** The results table nested in a layout table, as the portal serves it. */
export function listingHtml(rows: string[]): string {
  return (
    '<html><body><table id="layout"><tr><td>' +
    `<table id="results">${HEADER}${rows.join('')}</table>` +
    '</td></tr></table></body></html>'
  );
}

export function worksRow(tenderNo: string, id: number): string {
  return row([
    'North Division',
    tenderNo,
    'Platform resurfacing',
    'Active',
    'Works',
    '12/03/2026 15:00',
    '10',
    viewIcon(`/portal/view.do?id=${id}`),
  ]);
}

export const BASE_URL = 'https://portal.test';

/** An authenticated detail page with two labeled fields and one attachment. */
export function detailHtml(options: { script?: string } = {}): string {
  return (
    '<html><body>' +
    (options.script ? `<script>${options.script}</script>` : '') +
    '<table>' +
    '<tr><td>Tender Type</td><td>Open</td></tr>' +
    '<tr><td>Closing Date</td><td>20/03/2026 15:00</td></tr>' +
    '</table>' +
    '<table id="attach_docs">' +
    '<tr><th>Sl. No</th><th>File Name</th></tr>' +
    '<tr><td>1</td><td><a href="/pdfdocs/a.pdf">a.pdf</a></td></tr>' +
    '</table>' +
    '</body></html>'
  );
}

export const LOGIN_WALL_HTML =
  '<html><body><h3>Authenticate Yourself</h3><input placeholder="Enter Mobile No."></body></html>';
