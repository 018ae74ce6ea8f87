/** Raw formatting entities. Offsets and lengths count UTF-16 code units. */

interface EntitySpan {
  offset: number;
  length: number;
}

export type RawMessageEntity = EntitySpan & (
  | { _: 'messageEntityUnknown' }
  | { _: 'messageEntityMention' }
  | { _: 'messageEntityHashtag' }
  | { _: 'messageEntityCashtag' }
  | { _: 'messageEntityBotCommand' }
  | { _: 'messageEntityUrl' }
  | { _: 'messageEntityEmail' }
  | { _: 'messageEntityPhone' }
  | { _: 'messageEntityBankCard' }
  | { _: 'messageEntityBold' }
  | { _: 'messageEntityItalic' }
  | { _: 'messageEntityUnderline' }
  | { _: 'messageEntityStrike' }
  | { _: 'messageEntitySpoiler' }
  | { _: 'messageEntityCode' }
  | { _: 'messageEntityPre'; language: string }
  | { _: 'messageEntityTextUrl'; url: string }
  | { _: 'messageEntityMentionName'; user_id: number }
  | { _: 'messageEntityCustomEmoji'; document_id: bigint }
  | { _: 'messageEntityBlockquote'; collapsed?: boolean }
);

export interface RawTextWithEntities {
  text: string;
  entities: RawMessageEntity[];
}
