export class Quantity {
    static readonly MAX = 1000;

    private constructor(private readonly value: number) {}

    static create(value: number): Quantity {
        if (!Number.isInteger(value)) {
            throw new Error('Quantity must be an integer');
        }
        if (value <= 0) {
            throw new Error('Quantity must be greater than zero');
        }
        if (value > Quantity.MAX) {
            throw new Error(`Quantity cannot exceed ${Quantity.MAX} units`);
        }
        return new Quantity(value);
    }

    toNumber(): number {
        return this.value;
    }
}
