import { describe, it, expect } from 'vitest';
import { translateNativeEvent, type NativeContext, type NativeTranslation } from './nostr-to-ap';
import { npubEncode } from '@/lib/nostr/nip19';
import { AS_PUBLIC } from '@/lib/activitypub/activities';
import { ALICE_PK, ALICE_SK, BOB_PK, BOB_SK, signed } from '@/test-utils/events';

const DOMAIN = 'bridge.example';
const ALICE_ACTOR = `https://${DOMAIN}/users/${npubEncode(ALICE_PK)}`;
const CAROL = 'https://remote.example/users/carol';
const TARGET = 'a'.repeat(64);
const PARENT = 'b'.repeat(64);

function context(overrides: Partial<NativeContext> = {}): NativeContext {
  return {
    domain: DOMAIN,
    authorActorUri: ALICE_ACTOR,
    actors: new Map([[BOB_PK, { actorUri: CAROL, handle: 'carol@remote.example' }]]),
    objects: new Map(),
    ...overrides,
  };
}

function assertType<T extends NativeTranslation['type']>(
  value: NativeTranslation,
  type: T
): asserts value is Extract<NativeTranslation, { type: T }> {
  expect(value.type).toBe(type);
}

describe('translateNativeEvent: notes', () => {
  it('turns mentions, hashtags and content warnings into a Note', () => {
    const event = signed(ALICE_SK, {
      content: `hi nostr:${npubEncode(BOB_PK)} #cats`,
      tags: [['p', BOB_PK], ['t', 'cats'], ['content-warning', 'spoilers']],
    });

    const { value, degradations } = translateNativeEvent(event, context());
    assertType(value, 'note');
    const { note, activity, recipients } = value;

    expect(degradations).toEqual([]);
    expect(note.id).toBe(`https://${DOMAIN}/notes/${event.id}`);
    expect(note.content).toBe(
      '<p>hi <span class="h-card"><a href="https://remote.example/users/carol" class="u-url mention">@<span>carol</span></a></span> #cats</p>'
    );
    expect(note.tag).toEqual([
      { type: 'Mention', href: CAROL, name: '@carol@remote.example' },
      { type: 'Hashtag', name: '#cats' },
    ]);
    expect(note.summary).toBe('spoilers');
    expect(note.sensitive).toBe(true);
    expect(note.to).toEqual([AS_PUBLIC]);
    expect(note.cc).toEqual([`${ALICE_ACTOR}/followers`, CAROL]);
    expect(note.inReplyTo).toBeNull();
    expect(recipients).toEqual([CAROL]);
    expect(activity.type).toBe('Create');
    expect(activity.id).toBe(`${note.id}/activity`);
  });

  it('points replies at the bridged object of the parent', () => {
    const event = signed(ALICE_SK, { tags: [['e', PARENT, '', 'root']] });
    const ctx = context({ objects: new Map([[PARENT, 'https://remote.example/notes/1']]) });

    const { value } = translateNativeEvent(event, ctx);
    assertType(value, 'note');
    const { note } = value;

    expect(note.inReplyTo).toBe('https://remote.example/notes/1');
  });

  it('points replies to native notes at the bridge note URL', () => {
    const event = signed(ALICE_SK, { tags: [['e', PARENT, '', 'root']] });

    const { value } = translateNativeEvent(event, context());
    assertType(value, 'note');
    const { note } = value;

    expect(note.inReplyTo).toBe(`https://${DOMAIN}/notes/${PARENT}`);
  });

  it('keeps unresolvable mentions as text and reports them', () => {
    const stranger = 'c'.repeat(64);
    const event = signed(ALICE_SK, { content: `nostr:${npubEncode(stranger)}` });

    const { value, degradations } = translateNativeEvent(event, context());
    assertType(value, 'note');
    const { note } = value;

    expect(note.content).toBe(`<p>nostr:${npubEncode(stranger)}</p>`);
    expect(note.tag).toEqual([]);
    expect(degradations.map((d) => d.reason)).toEqual(['unresolved_mention']);
  });

  it('carries media as attachments and unsupported media as links', () => {
    const event = signed(ALICE_SK, {
      content: 'look https://img.example/cat.jpg',
      tags: [
        ['imeta', 'url https://img.example/cat.jpg', 'm image/jpeg', 'alt a cat'],
        ['imeta', 'url https://files.example/doc.pdf', 'm application/pdf'],
      ],
    });

    const { value, degradations } = translateNativeEvent(event, context());
    assertType(value, 'note');
    const { note } = value;

    expect(note.attachment).toEqual([
      { type: 'Document', mediaType: 'image/jpeg', url: 'https://img.example/cat.jpg', name: 'a cat' },
    ]);
    expect(note.content.endsWith('<p><a href="https://files.example/doc.pdf">https://files.example/doc.pdf</a></p>')).toBe(true);
    expect(degradations.map((d) => d.reason)).toEqual(['unsupported_media']);
  });

  it('sets every quote field from a q tag', () => {
    const event = signed(ALICE_SK, { tags: [['q', TARGET]] });

    const { value } = translateNativeEvent(event, context());
    assertType(value, 'note');
    const { note } = value;

    const url = `https://${DOMAIN}/notes/${TARGET}`;
    expect([note.quoteUrl, note._misskey_quote, note.quoteUri]).toEqual([url, url, url]);
  });
});

describe('translateNativeEvent: reactions and reposts', () => {
  it('turns a "+" reaction into a plain Like', () => {
    const event = signed(ALICE_SK, { kind: 7, content: '+', tags: [['e', TARGET], ['p', BOB_PK]] });

    const { value } = translateNativeEvent(event, context());
    assertType(value, 'reaction');
    const { activity, recipients } = value;

    expect(activity).toEqual({
      id: `https://${DOMAIN}/activities/${event.id}`,
      type: 'Like',
      actor: ALICE_ACTOR,
      object: `https://${DOMAIN}/notes/${TARGET}`,
    });
    expect(recipients).toEqual([CAROL]);
  });

  it('keeps custom emoji on a reaction', () => {
    const url = 'https://remote.example/emoji/blobcat.png';
    const event = signed(ALICE_SK, { kind: 7, content: ':blobcat:', tags: [['e', TARGET], ['emoji', 'blobcat', url]] });

    const { value } = translateNativeEvent(event, context());
    assertType(value, 'reaction');
    const { activity } = value;

    expect(activity.content).toBe(':blobcat:');
    expect(activity._misskey_reaction).toBe(':blobcat:');
    expect(activity.tag).toEqual([{ type: 'Emoji', name: ':blobcat:', id: url, icon: { type: 'Image', url } }]);
  });

  it('skips dislikes and reactions without a target', () => {
    const dislike = signed(ALICE_SK, { kind: 7, content: '-', tags: [['e', TARGET]] });
    const orphan = signed(ALICE_SK, { kind: 7, content: '+' });

    expect(translateNativeEvent(dislike, context()).value.type).toBe('skipped');
    const orphaned = translateNativeEvent(orphan, context());
    expect(orphaned.value.type).toBe('skipped');
    expect(orphaned.degradations.map((d) => d.reason)).toEqual(['invalid_reference']);
  });

  it('turns a repost into an Announce', () => {
    const event = signed(ALICE_SK, { kind: 6, tags: [['e', TARGET], ['p', BOB_PK]] });
    const ctx = context({ objects: new Map([[TARGET, 'https://remote.example/notes/7']]) });

    const { value } = translateNativeEvent(event, ctx);
    assertType(value, 'repost');
    const { activity } = value;

    expect(activity.type).toBe('Announce');
    expect(activity.object).toBe('https://remote.example/notes/7');
    expect(activity.published).toBe('2023-11-14T22:13:20.000Z');
    expect(activity.cc).toEqual([`${ALICE_ACTOR}/followers`, CAROL]);
  });
});

describe('translateNativeEvent: deletions', () => {
  it('undoes deleted reactions and tombstones deleted notes', () => {
    const reaction = signed(ALICE_SK, { kind: 7, content: '+', tags: [['e', TARGET]] });
    const deletion = signed(ALICE_SK, { kind: 5, tags: [['e', reaction.id], ['e', PARENT]] });
    const ctx = context({ deletedEvents: new Map([[reaction.id, reaction]]) });

    const { value } = translateNativeEvent(deletion, ctx);
    assertType(value, 'deletion');
    const { activities } = value;

    const base = `https://${DOMAIN}/activities/${deletion.id}`;
    expect(activities).toEqual([
      {
        id: `${base}#${reaction.id}`,
        type: 'Undo',
        actor: ALICE_ACTOR,
        object: {
          id: `https://${DOMAIN}/activities/${reaction.id}`,
          type: 'Like',
          actor: ALICE_ACTOR,
          object: `https://${DOMAIN}/notes/${TARGET}`,
        },
      },
      {
        id: `${base}#${PARENT}`,
        type: 'Delete',
        actor: ALICE_ACTOR,
        to: [AS_PUBLIC],
        object: { id: `https://${DOMAIN}/notes/${PARENT}`, type: 'Tombstone' },
      },
    ]);
  });

  it('ignores deletions of events by another author', () => {
    const foreign = signed(BOB_SK, { content: 'not yours' });
    const deletion = signed(ALICE_SK, { kind: 5, tags: [['e', foreign.id]] });
    const ctx = context({ deletedEvents: new Map([[foreign.id, foreign]]) });

    expect(translateNativeEvent(deletion, ctx).value).toEqual({ type: 'skipped', reason: 'nothing to delete' });
  });
});

describe('translateNativeEvent: metadata and contacts', () => {
  it('reads profile metadata', () => {
    const event = signed(ALICE_SK, {
      kind: 0,
      content: JSON.stringify({ name: 'alice', about: 'hi **there**', picture: 'https://img.example/a.png', banner: 'ftp://img.example/b.png' }),
    });

    const { value } = translateNativeEvent(event, context());
    assertType(value, 'profile');
    const { profile } = value;

    expect(profile).toEqual({
      displayName: 'alice',
      summary: '<p>hi <strong>there</strong></p>',
      avatarUrl: 'https://img.example/a.png',
      bannerUrl: null,
    });
  });

  it('skips metadata that is not a JSON object', () => {
    const event = signed(ALICE_SK, { kind: 0, content: '{nope' });

    expect(translateNativeEvent(event, context()).value).toEqual({ type: 'skipped', reason: 'metadata is not a profile object' });
  });

  it('lists the distinct followed pubkeys of a contact list', () => {
    const event = signed(ALICE_SK, { kind: 3, content: '', tags: [['p', BOB_PK], ['p', BOB_PK], ['p', 'not-a-key']] });

    expect(translateNativeEvent(event, context()).value).toEqual({ type: 'contacts', follows: [BOB_PK] });
  });

  it('skips kinds it does not bridge', () => {
    const event = signed(ALICE_SK, { kind: 30023 });

    expect(translateNativeEvent(event, context()).value).toEqual({ type: 'skipped', reason: 'unsupported kind 30023' });
  });
});
