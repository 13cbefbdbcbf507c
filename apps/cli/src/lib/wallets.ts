import { getWallet, listWallets, type openAddressBook, type WalletRecord } from '@whale-signal/address-book';

export type AddressBook = ReturnType<typeof openAddressBook>;

export interface WalletQuery {
  /** Look up a single wallet instead of listing */
  address?: string;
  blockchain: string;
  ownerType?: string;
}

/**
 * Wallets matching a query: the one stored row for an address, or every row
 * (optionally of one owner category) ordered by chain and address.
 */
export function findWallets(db: AddressBook, query: WalletQuery): WalletRecord[] {
  if (query.address !== undefined) {
    const record = getWallet(db, query.blockchain, query.address);
    return record ? [record] : [];
  }
  return listWallets(db, query.ownerType);
}

/**
 * One line per stored wallet for the `wallets` command
 */
export function formatWalletRecord(record: WalletRecord): string {
  const owner = record.owner ?? '-';
  const lastSeen = new Date(record.lastSeen * 1000).toISOString();
  return `${record.blockchain} ${record.address} ${record.ownerType} (${owner}) last seen ${lastSeen}`;
}
