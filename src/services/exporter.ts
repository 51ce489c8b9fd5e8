/**
 * CSV export of trades, orders and fills.
 *
 * export("out/history.csv") writes
 *   out/history_trades.csv, out/history_orders.csv, out/history_fills.csv
 */

import fs from 'fs';
import path from 'path';
import { TradeStore } from '../storage/tradeStore';
import logger from '../utils/logger';

type CsvCell = string | number | null;

export interface ExportedFiles {
    tradesFile: string;
    ordersFile: string;
    fillsFile: string;
}

const TRADE_COLUMNS = [
    'id', 'session_id', 'opened_at', 'closed_at', 'symbol', 'expiration', 'short_strike', 'long_strike',
    'quantity', 'credit', 'debit_to_close', 'status', 'pnl', 'open_reason', 'close_reason',
];
const ORDER_COLUMNS = [
    'id', 'trade_id', 'created_at', 'action', 'order_type', 'limit_price', 'quantity', 'status', 'broker_order_id',
];
const FILL_COLUMNS = ['id', 'order_id', 'created_at', 'price', 'quantity'];

export function csvEscape(cell: CsvCell): string {
    if (cell === null) return '';
    const text = String(cell);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: string[], rows: CsvCell[][]): string {
    return [header, ...rows].map(row => row.map(csvEscape).join(',')).join('\n') + '\n';
}

export function exportPaths(basePath: string): ExportedFiles {
    const stem = basePath.replace(/\.csv$/i, '');
    return {
        tradesFile: `${stem}_trades.csv`,
        ordersFile: `${stem}_orders.csv`,
        fillsFile: `${stem}_fills.csv`,
    };
}

export async function exportToCsv(store: TradeStore, basePath: string): Promise<ExportedFiles> {
    const files = exportPaths(basePath);

    const trades = await store.listTrades();
    const orders = await store.listOrders();
    const fills = await store.listFills();

    await fs.promises.mkdir(path.dirname(path.resolve(files.tradesFile)), { recursive: true });

    await fs.promises.writeFile(files.tradesFile, toCsv(TRADE_COLUMNS, trades.map(t => [
        t.id, t.sessionId, t.openedAt, t.closedAt, t.symbol, t.expiration, t.shortStrike, t.longStrike,
        t.quantity, t.credit, t.debitToClose, t.status, t.pnl, t.openReason, t.closeReason,
    ])));

    await fs.promises.writeFile(files.ordersFile, toCsv(ORDER_COLUMNS, orders.map(o => [
        o.id, o.tradeId, o.createdAt, o.action, o.orderType, o.limitPrice, o.quantity, o.status, o.brokerOrderId,
    ])));

    await fs.promises.writeFile(files.fillsFile, toCsv(FILL_COLUMNS, fills.map(f => [
        f.id, f.orderId, f.createdAt, f.price, f.quantity,
    ])));

    logger.info(
        `[EXPORT] ${trades.length} trade(s), ${orders.length} order(s), ${fills.length} fill(s) → ` +
        `${files.tradesFile}, ${files.ordersFile}, ${files.fillsFile}`
    );
    return files;
}
