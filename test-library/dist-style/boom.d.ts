export declare function boom(): void;
