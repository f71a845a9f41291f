export type Instant = string;
export type PaneId = string;
export type TabId = string;
export type TransactionId = string;
