import pc from 'picocolors'

export const colors = {
    error: (text: string) => pc.red(text),
    dim: (text: string) => pc.dim(text),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatDetail(detail: string): string {
    return detail
        .split('\n')
        .map((line) => colors.dim(`  ${line}`))
        .join('\n')
}
