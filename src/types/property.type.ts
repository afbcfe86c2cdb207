export enum PropertyType {
    APARTMENT = 'apartment',
    HOUSE = 'house',
    COMMERCIAL = 'commercial',
    OTHER = 'other',
}
