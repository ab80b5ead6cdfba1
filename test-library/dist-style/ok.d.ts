export declare function add(x: number): number;
