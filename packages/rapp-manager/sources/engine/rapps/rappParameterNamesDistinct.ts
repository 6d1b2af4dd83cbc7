/**
 * Parameters reach the child as RAPP_PARAM_<UPPERCASE NAME>, so names that differ only by case collide.
 */
export function rappParameterNamesDistinct(names: string[]): boolean {
    return new Set(names.map((name) => name.toUpperCase())).size === names.length;
}
