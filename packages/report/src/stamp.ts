const pad = (value: number): string => value.toString().padStart(2, '0');

/** `YYYYMMDD_HHMMSS` in local time, shared by every artifact of one run. */
export const formatStamp = (date: Date = new Date()): string => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
};

export const artifactName = (prefix: string, stamp: string, ext: string): string => `${prefix}_${stamp}.${ext}`;
