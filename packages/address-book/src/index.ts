export { openAddressBook } from './db.js';
export { upsertWallets, getWallet, listWallets, type WalletRecord } from './walletStore.js';
