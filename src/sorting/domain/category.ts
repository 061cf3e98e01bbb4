export enum Category {
  Standard = 'STANDARD',
  Special = 'SPECIAL',
  Rejected = 'REJECTED',
}

export type CategoryLabel = `${Category}`;

export function categoryLabel(category: Category): CategoryLabel {
  switch (category) {
    case Category.Standard:
      return 'STANDARD';
    case Category.Special:
      return 'SPECIAL';
    case Category.Rejected:
      return 'REJECTED';
  }
}
