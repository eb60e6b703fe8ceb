export interface SumQuantitiesResponseDto {
    count: number;
    total: number;
}
