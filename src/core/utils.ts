let seq = 0;

/** 进程内自增 id：el-1、el-2 ...（同一个 prefix 内唯一） */
export function nextId(prefix: string) {
  seq += 1;
  return `${prefix}-${seq}`;
}
