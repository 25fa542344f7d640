/**
 * 在宿主对象上挂载“业务无关”的运行期数据（类似 DOM dataset）。
 * 数据放在 WeakMap 里，不会写进对象本身，也就不会被 toObject 导出。
 */
export class Bag<T> {
  private store = new WeakMap<object, T>();

  constructor(readonly name: string) {}

  get(obj: object): T | undefined {
    return this.store.get(obj);
  }

  ensure(obj: object, init: () => T): T {
    const existed = this.store.get(obj);
    if (existed !== undefined) return existed;
    const value = init();
    this.store.set(obj, value);
    return value;
  }

  set(obj: object, value: T | undefined) {
    if (value === undefined) this.store.delete(obj);
    else this.store.set(obj, value);
  }
}
