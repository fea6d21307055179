export const getLocalTs = (d: Date = new Date()) => {
  return d.getFullYear() + "-" +
    String(d.getMonth() + 1).padStart(2, "0") + "-" +
    String(d.getDate()).padStart(2, "0") + " " +
    String(d.getHours()).padStart(2, "0") + ":" +
    String(d.getMinutes()).padStart(2, "0") + ":" +
    String(d.getSeconds()).padStart(2, "0");
};

export const log = {
  info(message: string) {
    console.log(`${getLocalTs()} ${message}`);
  },
  warn(message: string) {
    console.warn(`${getLocalTs()} ⚠️  ${message}`);
  },
  error(message: string, err?: unknown) {
    if (err === undefined) console.error(`${getLocalTs()} ⚠️  ${message}`);
    else console.error(`${getLocalTs()} ⚠️  ${message}`, err);
  },
};
