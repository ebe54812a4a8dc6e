import { config } from '@services/configuration/configuration';
import { CCXTPriceSource } from '@services/exchange/ccxtPriceSource';
import type { PriceSource } from '@services/exchange/priceSource.types';
import { SQLiteStorage } from '@services/storage/sqlite.storage';
import type { Storage } from '@services/storage/storage';

class Injecter {
  private storageInstance?: Storage;
  private priceSourceInstance?: PriceSource;

  public storage() {
    if (this.storageInstance) return this.storageInstance;
    const { database } = config.getStorage();
    this.storageInstance = new SQLiteStorage(database);
    return this.storageInstance;
  }

  public priceSource() {
    if (this.priceSourceInstance) return this.priceSourceInstance;
    this.priceSourceInstance = new CCXTPriceSource(config.getSource());
    return this.priceSourceInstance;
  }
}

export const inject = new Injecter();
