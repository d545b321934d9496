export const OPTION_TYPES = [
  'inventory_category',
  'inventory_status',
  'company_category',
  'collab_type',
  'deal_type',
  'contact_role',
] as const;

export type OptionType = (typeof OPTION_TYPES)[number];

export interface Choice {
  value: string;
  label: string;
  is_custom: boolean;
}

type BuiltinChoice = Omit<Choice, 'is_custom'>;

export const OPTION_TYPE_LABELS: Record<OptionType, string> = {
  inventory_category: 'Inventory Category',
  inventory_status: 'Inventory Status',
  company_category: 'Company Category',
  collab_type: 'Collaboration Type',
  deal_type: 'Deal Type',
  contact_role: 'Contact Role',
};

export const BUILTIN_CHOICES: Record<OptionType, readonly BuiltinChoice[]> = {
  inventory_category: [
    { value: 'mouse', label: 'Mouse' },
    { value: 'keyboard', label: 'Keyboard' },
    { value: 'mousepad', label: 'Mousepad' },
    { value: 'iem', label: 'IEM' },
    { value: 'other', label: 'Other' },
  ],
  inventory_status: [
    { value: 'in_queue', label: 'In Queue' },
    { value: 'reviewing', label: 'Reviewing' },
    { value: 'reviewed', label: 'Reviewed' },
    { value: 'keeping', label: 'Keeping' },
    { value: 'listed', label: 'Listed' },
    { value: 'sold', label: 'Sold' },
  ],
  company_category: [
    { value: 'mice', label: 'Mice' },
    { value: 'keyboards', label: 'Keyboards' },
    { value: 'mousepads', label: 'Mousepads' },
    { value: 'iems', label: 'IEMs' },
    { value: 'other', label: 'Other' },
  ],
  collab_type: [
    { value: 'guest_on_their_channel', label: 'Guest on Their Channel' },
    { value: 'guest_on_our_show', label: 'Guest on Our Show' },
    { value: 'cross_promo', label: 'Cross Promo' },
    { value: 'collab_video', label: 'Collab Video' },
  ],
  deal_type: [
    { value: 'paid_review', label: 'Paid Review' },
    { value: 'podcast_ad', label: 'Podcast Ad' },
    { value: 'sponsored_segment', label: 'Sponsored Segment' },
    { value: 'other', label: 'Other' },
  ],
  contact_role: [
    { value: 'reviewer', label: 'Reviewer' },
    { value: 'company_rep', label: 'Company Rep' },
    { value: 'podcast_guest', label: 'Podcast Guest' },
    { value: 'other', label: 'Other' },
  ],
};
