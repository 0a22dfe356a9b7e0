import Table from 'cli-table3';

export function renderTable(
  rows: Array<Array<string | number>>,
  options: Table.TableConstructorOptions & { head: string[] },
): string {
  const table = new Table(options);
  rows.forEach((row) => table.push(row.map((v) => String(v))));
  return table.toString();
}
