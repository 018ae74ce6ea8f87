import { describe, it, expect } from 'vitest';

import { createMessageCache } from '../src/core/message-cache.js';
import { createMessageDecoder } from '../src/core/message-decoder.js';
import { MessageMediaType, MessageServiceType, messageContent, messageLink, type Message } from '../src/core/message.js';
import { rpcError } from '../src/core/rpc-errors.js';
import {
  ALICE,
  DATE,
  SELF,
  TOPIC,
  makeClient,
  makeContent,
  makeDocument,
  makePhoto,
  makeService,
  makeTables,
} from './fixtures.js';

function setup(me: ReturnType<typeof makeClient>['me'] = { id: 1, isBot: false }) {
  const client = makeClient(me);
  const cache = createMessageCache(100);
  const decoder = createMessageDecoder({ client, cache, replyDepth: 1 });
  return { client, cache, decoder };
}

function stubMessage(id: number): Message {
  return { id, raw: { _: 'messageEmpty', id } };
}

describe('Empty records', () => {
  it('only marks the message as empty', async () => {
    const { decoder } = setup();
    const raw = { _: 'messageEmpty', id: 5 } as const;
    expect(await decoder.decode(raw, makeTables())).toEqual({ id: 5, raw, empty: true });
  });
});

describe('Text and caption', () => {
  it('puts the body in text when there is no media', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({ entities: [{ _: 'messageEntityBold', offset: 0, length: 5 }] }),
      makeTables(),
    );

    expect(message.text?.value).toBe('hello');
    expect(message.entities).toEqual([{ type: 'bold', offset: 0, length: 5 }]);
    expect(message.caption).toBeUndefined();
    expect(message.captionEntities).toBeUndefined();
    expect(message.chat).toEqual({ id: -200, type: 'group', title: 'Test group' });
    expect(message.fromUser?.id).toBe(100);
    expect(message.date).toEqual(new Date(DATE * 1000));
  });

  it('moves the body to the caption for media messages', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({
        message: 'look',
        entities: [{ _: 'messageEntityItalic', offset: 0, length: 4 }],
        media: { _: 'messageMediaPhoto', photo: makePhoto() },
      }),
      makeTables(),
    );

    expect(message.media).toBe(MessageMediaType.PHOTO);
    expect(message.photo?.width).toBe(800);
    expect(message.caption?.value).toBe('look');
    expect(message.captionEntities).toEqual([{ type: 'italic', offset: 0, length: 4 }]);
    expect(message.text).toBeUndefined();
    expect(message.entities).toBeUndefined();
    expect(message.hasMediaSpoiler).toBe(false);
  });

  it('keeps text for web page previews', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({
        message: 'https://example.com',
        media: {
          _: 'messageMediaWebPage',
          webpage: { _: 'webPage', id: 1n, url: 'https://example.com', display_url: 'example.com' },
        },
      }),
      makeTables(),
    );

    expect(message.media).toBe(MessageMediaType.WEB_PAGE);
    expect(message.text?.value).toBe('https://example.com');
    expect(message.caption).toBeUndefined();
  });

  it('treats unsupported media as no media', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(makeContent({ media: { _: 'messageMediaUnsupported' } }), makeTables());
    expect(message.media).toBeUndefined();
    expect(message.text?.value).toBe('hello');
  });

  it('keeps the body as caption when the media cannot be decoded', async () => {
    const { decoder } = setup();
    const expired = await decoder.decode(
      makeContent({ message: 'secret', media: { _: 'messageMediaPhoto', ttl_seconds: 10 } }),
      makeTables(),
    );
    expect(expired.media).toBeUndefined();
    expect(expired.caption?.value).toBe('secret');
    expect(expired.text).toBeUndefined();

    const emptyDocument = await decoder.decode(
      makeContent({
        message: 'doc',
        entities: [{ _: 'messageEntityBold', offset: 0, length: 3 }],
        media: { _: 'messageMediaDocument', document: { _: 'documentEmpty', id: 1n } },
      }),
      makeTables(),
    );
    expect(emptyDocument.caption?.value).toBe('doc');
    expect(emptyDocument.captionEntities).toEqual([{ type: 'bold', offset: 0, length: 3 }]);
    expect(emptyDocument.text).toBeUndefined();
    expect(emptyDocument.entities).toBeUndefined();
  });

  it('reports voice notes under the voice field', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({
        message: '',
        media: {
          _: 'messageMediaDocument',
          document: makeDocument([{ _: 'documentAttributeAudio', duration: 3, voice: true }]),
        },
      }),
      makeTables(),
    );
    expect(message.media).toBe(MessageMediaType.VOICE);
    expect(message.voice?.duration).toBe(3);
    expect(message.audio).toBeUndefined();
    expect(message.caption).toBeUndefined();
  });

  it('flags blockquotes as quotes', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({ entities: [{ _: 'messageEntityBlockquote', offset: 0, length: 5 }] }),
      makeTables(),
    );
    expect(message.quote).toBe(true);
  });

  it('falls back to an empty content string', () => {
    expect(messageContent(stubMessage(1)).value).toBe('');
  });
});

describe('Forum threads', () => {
  it('prefers the top message id as thread id', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({ reply_to: { _: 'messageReplyHeader', forum_topic: true, reply_to_msg_id: 50, reply_to_top_id: 40 } }),
      makeTables(),
      { replyDepth: 0 },
    );
    expect(message.topicMessage).toBe(true);
    expect(message.messageThreadId).toBe(40);
    expect(message.replyToTopMessageId).toBe(40);
  });

  it('falls back to the replied message id, then to 1', async () => {
    const { decoder } = setup();
    const byReply = await decoder.decode(
      makeContent({ reply_to: { _: 'messageReplyHeader', forum_topic: true, reply_to_msg_id: 50 } }),
      makeTables(),
      { replyDepth: 0 },
    );
    expect(byReply.messageThreadId).toBe(50);

    const general = await decoder.decode(
      makeService({ _: 'messageActionChatEditTitle', title: 'New' }, { reply_to: { _: 'messageReplyHeader', forum_topic: true } }),
      makeTables(),
    );
    expect(general.messageThreadId).toBe(1);
    expect(general.topicMessage).toBe(true);
  });

  it('attaches the topic from the supplied table', async () => {
    const { client, decoder } = setup();
    const message = await decoder.decode(
      makeContent({
        peer_id: { _: 'peerChannel', channel_id: 300 },
        reply_to: { _: 'messageReplyHeader', forum_topic: true, reply_to_msg_id: 40 },
      }),
      makeTables({ topics: [TOPIC] }),
      { replyDepth: 0 },
    );
    expect(message.topic?.title).toBe('General chatter');
    expect(client.fetchTopic).not.toHaveBeenCalled();
  });

  it('looks up the general topic of forum chats', async () => {
    const { client, decoder } = setup();
    await decoder.decode(makeContent({ peer_id: { _: 'peerChannel', channel_id: 300 } }), makeTables());
    expect(client.fetchTopic).toHaveBeenCalledWith(-1000000000300, 1);
  });

  it('skips the topic lookup for bots', async () => {
    const { client, decoder } = setup({ id: 500, isBot: true });
    await decoder.decode(makeContent({ peer_id: { _: 'peerChannel', channel_id: 300 } }), makeTables());
    expect(client.fetchTopic).not.toHaveBeenCalled();
  });

  it('leaves the topic unset when the forum is gone', async () => {
    const { client, decoder } = setup();
    client.fetchTopic.mockRejectedValueOnce(rpcError('CHANNEL_FORUM_MISSING'));
    const message = await decoder.decode(makeContent({ peer_id: { _: 'peerChannel', channel_id: 300 } }), makeTables());
    expect(message.topic).toBeUndefined();
  });
});

describe('Reply resolution', () => {
  const reply = { _: 'messageReplyHeader', reply_to_msg_id: 9 } as const;

  it('does not follow replies at depth 0', async () => {
    const { client, decoder } = setup();
    const message = await decoder.decode(makeContent({ reply_to: reply }), makeTables(), { replyDepth: 0 });
    expect(message.replyToMessageId).toBe(9);
    expect(message.replyToMessage).toBeUndefined();
    expect(client.fetchReplyTarget).not.toHaveBeenCalled();
    expect(client.fetchMessageById).not.toHaveBeenCalled();
  });

  it('fetches the reply target once with one hop less', async () => {
    const { client, decoder } = setup();
    const target = stubMessage(9);
    client.fetchReplyTarget.mockResolvedValueOnce(target);

    const message = await decoder.decode(makeContent({ reply_to: reply }), makeTables(), { replyDepth: 2 });

    expect(client.fetchReplyTarget).toHaveBeenCalledTimes(1);
    expect(client.fetchReplyTarget).toHaveBeenCalledWith(-200, 10, 1);
    expect(message.replyToMessage).toBe(target);
  });

  it('serves reply targets from the cache', async () => {
    const { client, decoder } = setup();
    const tables = makeTables();
    const first = await decoder.decode(makeContent({ id: 9 }), tables);
    const second = await decoder.decode(makeContent({ reply_to: reply }), tables);

    expect(second.replyToMessage).toBe(first);
    expect(client.fetchReplyTarget).not.toHaveBeenCalled();
  });

  it('fetches cross-chat replies by id', async () => {
    const { client, decoder } = setup();
    await decoder.decode(
      makeContent({ reply_to: { ...reply, reply_to_peer_id: { _: 'peerChannel', channel_id: 400 } } }),
      makeTables(),
    );
    expect(client.fetchMessageById).toHaveBeenCalledWith(-1000000000400, 9, 0);
  });

  it('decodes a prefetched target without further lookups', async () => {
    const { client, decoder } = setup();
    const message = await decoder.decode(makeContent({ reply_to: reply }), makeTables(), {
      prefetchedReplyTarget: makeContent({ id: 9, message: 'first post', reply_to: { _: 'messageReplyHeader', reply_to_msg_id: 3 } }),
    });

    expect(message.replyToMessage?.id).toBe(9);
    expect(message.replyToMessage?.text?.value).toBe('first post');
    expect(message.replyToMessage?.replyToMessageId).toBe(3);
    expect(message.replyToMessage?.replyToMessage).toBeUndefined();
    expect(client.fetchReplyTarget).not.toHaveBeenCalled();
  });

  it('ignores a prefetched target when the message is not a reply', async () => {
    const { client, decoder } = setup();
    const message = await decoder.decode(makeContent({ message: 'x' }), makeTables(), {
      prefetchedReplyTarget: makeContent({ id: 99 }),
    });

    expect(message.replyToMessage).toBeUndefined();
    expect(message.replyToMessageId).toBeUndefined();
    expect(client.fetchReplyTarget).not.toHaveBeenCalled();
  });

  it('ignores deleted reply targets', async () => {
    const { client, decoder } = setup();
    client.fetchReplyTarget.mockRejectedValueOnce(rpcError('MESSAGE_IDS_EMPTY'));
    const message = await decoder.decode(makeContent({ reply_to: reply }), makeTables());
    expect(message.replyToMessageId).toBe(9);
    expect(message.replyToMessage).toBeUndefined();
  });

  it('passes other errors through', async () => {
    const { client, decoder } = setup();
    const error = rpcError('FLOOD_WAIT');
    client.fetchReplyTarget.mockRejectedValueOnce(error);
    await expect(decoder.decode(makeContent({ reply_to: reply }), makeTables())).rejects.toBe(error);
  });

  it('keeps quoted fragments of the replied message', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({
        reply_to: {
          ...reply,
          quote: true,
          quote_text: 'quoted',
          quote_entities: [{ _: 'messageEntityBold', offset: 0, length: 6 }],
        },
      }),
      makeTables(),
      { replyDepth: 0 },
    );
    expect(message.quote).toBe(true);
    expect(message.quoteText?.markdown).toBe('**quoted**');
    expect(message.quoteEntities).toEqual([{ type: 'bold', offset: 0, length: 6 }]);
  });

  it('resolves story replies for user accounts', async () => {
    const { client, decoder } = setup();
    const message = await decoder.decode(
      makeContent({ reply_to: { _: 'messageReplyStoryHeader', peer: { _: 'peerUser', user_id: 100 }, story_id: 7 } }),
      makeTables(),
    );
    expect(message.replyToStoryId).toBe(7);
    expect(message.replyToStoryUserId).toBe(100);
    expect(client.fetchStory).toHaveBeenCalledWith(100, 7);
  });
});

describe('Forwards', () => {
  it('records channel forwards with their post id', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeContent({
        fwd_from: {
          date: DATE,
          from_id: { _: 'peerChannel', channel_id: 400 },
          channel_post: 77,
          post_author: 'Editor',
          saved_from_peer: { _: 'peerChannel', channel_id: 400 },
          saved_from_msg_id: 77,
        },
      }),
      makeTables(),
    );

    expect(message.forwardFromChat?.id).toBe(-1000000000400);
    expect(message.forwardFromMessageId).toBe(77);
    expect(message.forwardSignature).toBe('Editor');
    expect(message.forwardDate).toEqual(new Date(DATE * 1000));
    expect(message.automaticForward).toBe(true);
  });

  it('keeps the name of hidden senders', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(makeContent({ fwd_from: { date: DATE, from_name: 'Someone' } }), makeTables());
    expect(message.forwardSenderName).toBe('Someone');
    expect(message.forwardFrom).toBeUndefined();
    expect(message.automaticForward).toBeUndefined();
  });
});

describe('Service messages', () => {
  it('sets the tag and the matching field', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(makeService({ _: 'messageActionChatDeletePhoto' }), makeTables());
    expect(message.service).toBe(MessageServiceType.DELETE_CHAT_PHOTO);
    expect(message.deleteChatPhoto).toBe(true);
    expect(message.service && message[message.service]).toBe(true);
  });

  it('carries delivery flags on content messages only', async () => {
    const { decoder } = setup();
    const service = await decoder.decode(
      makeService({ _: 'messageActionChatDeletePhoto' }, { out: true, mentioned: true }),
      makeTables(),
      { isScheduled: true },
    );
    expect(service).not.toHaveProperty('outgoing');
    expect(service).not.toHaveProperty('mentioned');
    expect(service).not.toHaveProperty('scheduled');

    const content = await decoder.decode(makeContent({ out: true }), makeTables(), { isScheduled: true });
    expect(content.outgoing).toBe(true);
    expect(content.mentioned).toBe(false);
    expect(content.scheduled).toBe(true);
  });

  it('attaches the pinned message', async () => {
    const { client, decoder } = setup();
    const pinned = stubMessage(3);
    client.fetchPinnedMessage.mockResolvedValueOnce(pinned);

    const message = await decoder.decode(makeService({ _: 'messageActionPinMessage' }), makeTables());

    expect(client.fetchPinnedMessage).toHaveBeenCalledWith(-200, 11);
    expect(message.service).toBe(MessageServiceType.PINNED_MESSAGE);
    expect(message.pinnedMessage).toBe(pinned);
  });

  it('leaves the message untouched when the pinned message is gone', async () => {
    const { client, decoder } = setup();
    client.fetchPinnedMessage.mockRejectedValueOnce(rpcError('MESSAGE_IDS_EMPTY'));
    const message = await decoder.decode(makeService({ _: 'messageActionPinMessage' }), makeTables());
    expect(message.pinnedMessage).toBeUndefined();
    expect(message.service).toBeUndefined();
  });

  it('links game scores to the game message', async () => {
    const { client, decoder } = setup();
    const game = stubMessage(4);
    client.fetchReplyTarget.mockResolvedValueOnce(game);

    const message = await decoder.decode(
      makeService(
        { _: 'messageActionGameScore', game_id: 1n, score: 42 },
        { reply_to: { _: 'messageReplyHeader', reply_to_msg_id: 4 } },
      ),
      makeTables(),
    );

    expect(client.fetchReplyTarget).toHaveBeenCalledWith(-200, 11, 0);
    expect(message.service).toBe(MessageServiceType.GAME_HIGH_SCORE);
    expect(message.gameHighScore?.score).toBe(42);
    expect(message.replyToMessage).toBe(game);
  });

  it('resolves the launch message of a finished giveaway', async () => {
    const { client, decoder } = setup();
    const launch = stubMessage(8);
    client.fetchMessageById.mockResolvedValueOnce(launch);

    const message = await decoder.decode(
      makeService(
        { _: 'messageActionGiveawayResults', winners_count: 2, unclaimed_count: 0 },
        { reply_to: { _: 'messageReplyHeader', reply_to_msg_id: 8 } },
      ),
      makeTables(),
    );

    expect(client.fetchMessageById).toHaveBeenCalledWith(-200, 8, 0);
    expect(message.giveawayCompleted?.giveawayMessage).toBe(launch);
  });

  it('attributes channel posts to the channel', async () => {
    const { decoder } = setup();
    const message = await decoder.decode(
      makeService({ _: 'messageActionChannelCreate', title: 'News' }, { peer_id: { _: 'peerChannel', channel_id: 400 }, from_id: undefined }),
      makeTables(),
    );
    expect(message.fromUser).toBeUndefined();
    expect(message.senderChat?.id).toBe(-1000000000400);
    expect(message.channelChatCreated).toBe(true);
  });
});

describe('Private chats', () => {
  const privateMessage = makeContent({
    peer_id: { _: 'peerUser', user_id: 100 },
    from_id: { _: 'peerUser', user_id: 1 },
  });

  it('fetches peers missing from the user table', async () => {
    const { client, decoder } = setup();
    client.fetchUsers.mockResolvedValueOnce([SELF]);
    const tables = makeTables();

    const message = await decoder.decode(privateMessage, tables);

    expect(client.fetchUsers).toHaveBeenCalledWith([1, 100]);
    expect(tables.users.get(1)).toBe(SELF);
    expect(message.fromUser?.isSelf).toBe(true);
    expect(message.chat).toEqual({ id: 100, type: 'private', firstName: 'Alice', username: 'alice' });
  });

  it('continues with what it has when the peer is invalid', async () => {
    const { client, decoder } = setup();
    client.fetchUsers.mockRejectedValueOnce(rpcError('PEER_ID_INVALID'));
    const message = await decoder.decode(privateMessage, makeTables());
    expect(message.fromUser).toBeUndefined();
    expect(message.chat?.id).toBe(100);
  });

  it('skips the lookup when both users are known', async () => {
    const { client, decoder } = setup();
    await decoder.decode(privateMessage, makeTables({ users: [SELF] }));
    expect(client.fetchUsers).not.toHaveBeenCalled();
  });
});

describe('Caching', () => {
  it('stores decoded messages by chat and id', async () => {
    const { cache, decoder } = setup();
    const message = await decoder.decode(makeContent(), makeTables());
    expect(cache.get(-200, 10)).toBe(message);
  });

  it('does not store polls', async () => {
    const { cache, decoder } = setup();
    await decoder.decode(
      makeContent({
        message: '',
        media: {
          _: 'messageMediaPoll',
          poll: { id: 1n, question: { text: 'Lunch?', entities: [] }, answers: [] },
          results: {},
        },
      }),
      makeTables(),
    );
    expect(cache.get(-200, 10)).toBeUndefined();
  });

  it('decodes the same record identically with fresh caches', async () => {
    const raw = makeContent({
      entities: [{ _: 'messageEntityBold', offset: 0, length: 5 }],
      reply_to: { _: 'messageReplyHeader', reply_to_msg_id: 9 },
    });
    const first = await setup().decoder.decode(raw, makeTables());
    const second = await setup().decoder.decode(raw, makeTables());
    expect(second).toEqual(first);
  });
});

describe('Batches and links', () => {
  it('builds peer tables from the response', async () => {
    const { decoder } = setup();
    const messages = await decoder.decodeMessages({
      messages: [makeContent({ id: 1 }), { _: 'messageEmpty', id: 2 }],
      users: [ALICE],
      chats: [{ _: 'chat', id: 200, title: 'Batch group' }],
    });

    expect(messages.map((message) => message.id)).toEqual([1, 2]);
    expect(messages[0]?.chat?.title).toBe('Batch group');
    expect(messages[0]?.fromUser?.firstName).toBe('Alice');
    expect(messages[1]?.empty).toBe(true);
  });

  it('links public chats by username and private ones by id', async () => {
    const { decoder } = setup();
    const tables = makeTables();
    const publicPost = await decoder.decode(
      makeContent({ peer_id: { _: 'peerChannel', channel_id: 400 }, from_id: undefined }),
      tables,
    );
    const forumPost = await decoder.decode(
      makeContent({ peer_id: { _: 'peerChannel', channel_id: 300 } }),
      tables,
    );

    expect(messageLink(publicPost)).toBe('https://t.me/newsroom/10');
    expect(messageLink(forumPost)).toBe('https://t.me/c/300/10');
  });
});
