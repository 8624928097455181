import {
  LEDGER_ENTRY_TYPES,
  StockLedgerEntryRow,
  StockLevelRow,
} from '../database/schema';

export type LedgerEntryType = (typeof LEDGER_ENTRY_TYPES)[number];

export type StockLevel = StockLevelRow;

export type LedgerEntry = StockLedgerEntryRow;

export type NewLedgerEntry = Omit<LedgerEntry, 'id' | 'createdAt'>;

/** Business object that caused a ledger entry, e.g. an order or a transfer. */
export type LedgerReference = {
  type: string;
  id: string;
};

export type LedgerChange = {
  type: LedgerEntryType;
  quantityChange: number;
  reference?: LedgerReference | null;
  actorId?: number | null;
  notes?: string | null;
};

export type ApplyTransactionInput = LedgerChange & {
  productId: number;
  warehouseId: number;
};

export type ReservationInput = {
  productId: number;
  warehouseId: number;
  quantity: number;
  actorId?: number | null;
};

export type TransferInput = {
  productId: number;
  fromWarehouseId: number;
  toWarehouseId: number;
  quantity: number;
  reference?: LedgerReference | null;
  actorId?: number | null;
  notes?: string | null;
};

export type TransferResult = {
  outbound: LedgerEntry;
  inbound: LedgerEntry;
};

export type StockLevelView = {
  productId: number;
  warehouseId: number;
  quantity: number;
  reservedQty: number;
  available: number;
  version: number;
  updatedAt: Date | null;
};

export type LedgerQuery = {
  productId?: number;
  warehouseId?: number;
  type?: LedgerEntryType;
  from?: Date;
  to?: Date;
  /** Only entries with a smaller id; ledger ids grow monotonically. */
  beforeId?: number;
  take: number;
};

export type ReconciliationReport = {
  productId: number;
  warehouseId: number;
  entryCount: number;
  lastEntryId: number | null;
  replayedQuantity: number;
  levelQuantity: number;
  chainBreaks: number[];
  consistent: boolean;
};
