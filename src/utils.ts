export function isalpha(char: string): boolean {
    return 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'.includes(char);
}

// letters of any script count, so that `\alphaé` is caught as well as `\pi2`
export function isalnum(char: string): boolean {
    return /^[\p{L}\p{N}]$/u.test(char);
}

export function escape_regexp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
