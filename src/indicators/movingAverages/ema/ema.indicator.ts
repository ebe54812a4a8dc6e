import { Indicator } from '../../indicator';

/**
 * Exponential moving average seeded on the data available so far.
 *
 * The mean of the first `period` prices is the seed; from there on each price
 * is folded in with `alpha = 2 / (period + 1)`. A streaming consumer only
 * knows the seed once `period` prices arrived, so until then the result is
 * the running mean of every price received.
 */
export class EMA extends Indicator<'EMA'> {
  private period: number;
  private alpha: number;
  private age: number;
  private sum: number;
  private prevEma: number;

  constructor({ period = 30 }: IndicatorRegistry['EMA']['input'] = {}) {
    super('EMA', null);
    this.period = period;
    this.alpha = 2 / (period + 1);
    this.age = 0;
    this.sum = 0;
    this.prevEma = 0;
  }

  public onNewPrice(price: number) {
    if (this.age < this.period) {
      this.sum += price;
      this.age++;
      this.prevEma = this.sum / this.age;
      this.result = this.prevEma;
      return;
    }

    this.prevEma = (price - this.prevEma) * this.alpha + this.prevEma;
    this.result = this.prevEma;
  }

  public getResult() {
    return this.result;
  }
}
