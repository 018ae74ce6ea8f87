import type { RawMessageReactions, RawReactionCount } from '../raw/index.js';

export interface Reaction {
  emoji?: string;
  customEmojiId?: bigint;
  isPaid?: boolean;
  count: number;
  chosenOrder?: number;
}

export interface MessageReactions {
  reactions: Reaction[];
}

function parseReaction(result: RawReactionCount): Reaction | null {
  let reaction: Reaction;
  switch (result.reaction._) {
    case 'reactionEmoji':
      reaction = { emoji: result.reaction.emoticon, count: result.count };
      break;
    case 'reactionCustomEmoji':
      reaction = { customEmojiId: result.reaction.document_id, count: result.count };
      break;
    case 'reactionPaid':
      reaction = { isPaid: true, count: result.count };
      break;
    default:
      return null;
  }
  if (result.chosen_order !== undefined) reaction.chosenOrder = result.chosen_order;
  return reaction;
}

/** Reaction counters; empty reactions are skipped */
export function parseReactions(raw: RawMessageReactions | undefined): MessageReactions | null {
  if (!raw) return null;

  const reactions: Reaction[] = [];
  for (const result of raw.results) {
    const reaction = parseReaction(result);
    if (reaction) reactions.push(reaction);
  }
  return { reactions };
}
