import { describe, it, expect } from 'vitest';
import {
  isPublic,
  translateActorProfile,
  translateContactList,
  translateFederationNote,
  translateReaction,
  type FederationContext,
} from './ap-to-nostr';
import { inboundActivitySchema, noteSchema, remoteActorSchema, type InboundActivity } from '@/lib/activitypub/schemas';
import { AS_PUBLIC } from '@/lib/activitypub/activities';
import { labelTags } from '@/lib/nostr/tags';
import { npubEncode, noteEncode } from '@/lib/nostr/nip19';
import { ALICE_PK, BOB_PK } from '@/test-utils/events';

const NS = 'example.bridge';
const ALICE_ACTOR = `https://bridge.example/users/${npubEncode(ALICE_PK)}`;
const CAROL = 'https://remote.example/users/carol';
const PARENT = 'b'.repeat(64);
const QUOTED = 'c'.repeat(64);

function context(overrides: Partial<FederationContext> = {}): FederationContext {
  return { namespace: NS, actors: new Map([[ALICE_ACTOR, ALICE_PK]]), objects: new Map(), ...overrides };
}

function note(fields: Record<string, unknown>) {
  return noteSchema.parse({
    id: 'https://remote.example/users/carol/statuses/2',
    type: 'Note',
    attributedTo: CAROL,
    to: [AS_PUBLIC],
    published: '2024-01-01T00:00:00Z',
    ...fields,
  });
}

function reaction(fields: Record<string, unknown>): Extract<InboundActivity, { type: 'Like' | 'EmojiReact' }> {
  const activity = inboundActivitySchema.parse({
    id: 'https://remote.example/likes/1',
    type: 'Like',
    actor: CAROL,
    object: 'https://bridge.example/notes/1',
    ...fields,
  });
  if (activity.type !== 'Like' && activity.type !== 'EmojiReact') {
    throw new Error(`unexpected ${activity.type}`);
  }
  return activity;
}

const aliceMention =
  `<span class="h-card"><a href="${ALICE_ACTOR}" class="u-url mention">@<span>alice</span></a></span>`;

describe('translateFederationNote', () => {
  it('strips leading mentions from replies and collapses hashtags', () => {
    const parentUrl = `https://bridge.example/notes/${PARENT}`;
    const inbound = note({
      content: `<p>${aliceMention} agreed <a href="https://remote.example/tags/cats" class="mention hashtag" rel="tag">#<span>Cats</span></a></p>`,
      inReplyTo: parentUrl,
      tag: [
        { type: 'Mention', href: ALICE_ACTOR, name: '@alice@bridge.example' },
        { type: 'Hashtag', href: 'https://remote.example/tags/cats', name: '#Cats' },
      ],
    });
    const ctx = context({ objects: new Map([[parentUrl, { eventId: PARENT, pubkey: ALICE_PK }]]) });

    const { value, degradations } = translateFederationNote(inbound, ctx);

    expect(degradations).toEqual([]);
    expect(value).toEqual({
      kind: 1,
      content: 'agreed #Cats',
      tags: [
        ['e', PARENT, '', 'root'],
        ['t', 'cats'],
        ['p', ALICE_PK],
        ...labelTags(NS, inbound.id),
      ],
      created_at: 1704067200,
    });
  });

  it('marks root and reply when the parent is itself a reply', () => {
    const parentUrl = 'https://remote.example/notes/parent';
    const root = 'd'.repeat(64);
    const inbound = note({ content: '<p>deep</p>', inReplyTo: parentUrl });
    const ctx = context({ objects: new Map([[parentUrl, { eventId: PARENT, pubkey: BOB_PK, rootId: root }]]) });

    const { value } = translateFederationNote(inbound, ctx);

    expect(value.tags.slice(0, 3)).toEqual([
      ['e', root, '', 'root'],
      ['e', PARENT, '', 'reply'],
      ['p', BOB_PK],
    ]);
  });

  it('degrades a reply to an unknown parent into a top-level note', () => {
    const inbound = note({
      content: `<p>${aliceMention} hi</p>`,
      inReplyTo: 'https://elsewhere.example/notes/404',
      tag: [{ type: 'Mention', href: ALICE_ACTOR, name: '@alice@bridge.example' }],
    });

    const { value, degradations } = translateFederationNote(inbound, context());

    expect(value.content).toBe(`nostr:${npubEncode(ALICE_PK)} hi`);
    expect(value.tags.filter((t) => t[0] === 'e')).toEqual([]);
    expect(degradations.map((d) => d.reason)).toEqual(['missing_parent']);
  });

  it('rewrites resolvable mentions and keeps the handle of the others', () => {
    const content = '<p><span class="h-card"><a href="https://remote.example/@dave" class="u-url mention">@<span>dave</span></a></span> hello</p>';
    const tag = [{ type: 'Mention', href: 'https://remote.example/users/dave', name: '@dave@remote.example' }];

    const unresolved = translateFederationNote(note({ content, tag }), context());
    expect(unresolved.value.content).toBe('@dave@remote.example hello');
    expect(unresolved.degradations.map((d) => [d.reason, d.subject])).toEqual([
      ['unresolved_mention', 'https://remote.example/users/dave'],
    ]);

    const resolved = translateFederationNote(
      note({ content, tag }),
      context({ actors: new Map([['https://remote.example/users/dave', BOB_PK]]) })
    );
    expect(resolved.value.content).toBe(`nostr:${npubEncode(BOB_PK)} hello`);
    expect(resolved.value.tags[0]).toEqual(['p', BOB_PK]);
  });

  it('appends attachments and quotes', () => {
    const quoteUrl = 'https://remote.example/notes/9';
    const inbound = note({
      content: '<p>look</p>',
      quoteUrl,
      attachment: [
        { type: 'Document', mediaType: 'image/png', url: 'https://remote.example/media/1.png', name: 'a cat' },
        { type: 'Document', mediaType: 'application/pdf', url: 'https://remote.example/media/2.pdf' },
      ],
    });
    const ctx = context({ objects: new Map([[quoteUrl, { eventId: QUOTED, pubkey: BOB_PK }]]) });

    const { value, degradations } = translateFederationNote(inbound, ctx);

    expect(value.content).toBe(
      `look\n\nnostr:${noteEncode(QUOTED)}\n\nhttps://remote.example/media/1.png\nhttps://remote.example/media/2.pdf`
    );
    expect(value.tags).toEqual([
      ['q', QUOTED, '', BOB_PK],
      ['imeta', 'url https://remote.example/media/1.png', 'm image/png', 'alt a cat'],
      ['p', BOB_PK],
      ...labelTags(NS, inbound.id),
    ]);
    expect(degradations.map((d) => d.reason)).toEqual(['unsupported_media']);
  });

  it('keeps the link of a quote that cannot be resolved', () => {
    const inbound = note({ content: '<p>look</p>', _misskey_quote: 'https://remote.example/notes/9' });

    const { value, degradations } = translateFederationNote(inbound, context());

    expect(value.content).toBe('look\n\nhttps://remote.example/notes/9');
    expect(degradations.map((d) => d.reason)).toEqual(['missing_quote']);
  });

  it('turns summary and sensitive into a content warning', () => {
    expect(translateFederationNote(note({ content: '<p>x</p>', summary: 'spoilers' }), context()).value.tags[0])
      .toEqual(['content-warning', 'spoilers']);
    expect(translateFederationNote(note({ content: '<p>x</p>', sensitive: true }), context()).value.tags[0])
      .toEqual(['content-warning', '']);
  });
});

describe('isPublic', () => {
  it('accepts every spelling of the public collection', () => {
    expect(isPublic([AS_PUBLIC], [])).toBe(true);
    expect(isPublic([], ['as:Public'])).toBe(true);
    expect(isPublic([`${CAROL}/followers`], [ALICE_ACTOR])).toBe(false);
  });
});

describe('translateReaction', () => {
  const target = { eventId: PARENT, pubkey: ALICE_PK };

  it('maps a plain like to "+"', () => {
    expect(translateReaction(reaction({}), target, NS)).toEqual({
      kind: 7,
      content: '+',
      tags: [['e', PARENT], ['p', ALICE_PK], ...labelTags(NS, 'https://remote.example/likes/1')],
      created_at: expect.any(Number),
    });
  });

  it('keeps unicode emoji reactions', () => {
    expect(translateReaction(reaction({ _misskey_reaction: '👍' }), target, NS).content).toBe('👍');
    expect(translateReaction(reaction({ content: 'liked this' }), target, NS).content).toBe('+');
  });

  it('keeps custom emoji reactions with their image', () => {
    const url = 'https://remote.example/emoji/blobcat.png';
    const event = translateReaction(
      reaction({ type: 'EmojiReact', content: ':blobcat:', tag: [{ type: 'Emoji', name: ':blobcat:', icon: { url } }] }),
      target,
      NS
    );

    expect(event.content).toBe(':blobcat:');
    expect(event.tags[2]).toEqual(['emoji', 'blobcat', url]);
  });
});

describe('translateActorProfile', () => {
  it('builds kind 0 metadata from an actor document', () => {
    const actor = remoteActorSchema.parse({
      id: CAROL,
      type: 'Person',
      preferredUsername: 'carol',
      name: 'Carol',
      summary: '<p>hello</p>',
      inbox: `${CAROL}/inbox`,
      icon: { type: 'Image', url: 'https://remote.example/a.png' },
      publicKey: { id: `${CAROL}#main-key`, owner: CAROL, publicKeyPem: 'PEM' },
    });

    const event = translateActorProfile(actor, NS);

    expect(event.kind).toBe(0);
    expect(JSON.parse(event.content)).toEqual({
      name: 'carol',
      display_name: 'Carol',
      about: 'hello',
      picture: 'https://remote.example/a.png',
    });
    expect(event.tags).toEqual(labelTags(NS, CAROL));
  });
});

describe('translateContactList', () => {
  it('caps the number of entries', () => {
    const event = translateContactList(CAROL, [ALICE_PK, BOB_PK, PARENT], 2, NS);

    expect(event.tags.filter((t) => t[0] === 'p')).toEqual([['p', ALICE_PK], ['p', BOB_PK]]);
  });
});
