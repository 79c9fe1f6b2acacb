const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Local-time stamp for frame file names: YYYYMMDD_HHMMSS
 */
export function formatFrameTimestamp(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    return `${day}_${time}`
}
