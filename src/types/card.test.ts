import { describe, expect, it } from 'vitest'
import {
  type Card,
  cardFromJson,
  cardName,
  cardToJson,
  compareCards,
  conditionFromSymbol,
  type OwnedCard,
  ownedCardFromJson,
  ownedCardToJson,
  variantKey
} from './card'

function card(overrides: Partial<Card> = {}): Card {
  return {
    id: 'card-1',
    set: 'm21',
    number: '2',
    lang: 'en',
    rarity: 'common',
    faces: [{ name: 'Alpine Watchdog', type: 'Creature — Dog', cost: '{1}{W}', text: 'Vigilance' }],
    ...overrides
  }
}

describe('cards', () => {
  it('joins face names', () => {
    const split = card({
      faces: [
        { name: 'Fire', type: 'Instant', cost: '{1}{R}', text: '' },
        { name: 'Ice', type: 'Instant', cost: '{1}{U}', text: '' }
      ]
    })

    expect(cardName(split)).toBe('Fire // Ice')
  })

  it('maps condition symbols', () => {
    expect(conditionFromSymbol('*SL*')).toBe('slightly-used')
    expect(conditionFromSymbol('ME')).toBe('medium-used')
    expect(conditionFromSymbol('*he*')).toBe('heavy-used')
    expect(conditionFromSymbol('*XX*')).toBe('mint')
    expect(conditionFromSymbol('')).toBe('mint')
  })

  it('keys variants by printing, finish and condition', () => {
    const owned: OwnedCard = { ...card(), count: 1, foil: true, condition: 'mint' }

    expect(variantKey(owned)).toBe('m21:2:en:foil:mint')
  })

  it('orders by set, then number numerically, then name', () => {
    const cards = [
      card({ set: 'm21', number: '10' }),
      card({ set: 'khm', number: '5' }),
      card({ set: 'm21', number: '9' }),
      card({ set: 'm21', number: '9a' })
    ]

    expect([...cards].sort(compareCards).map((c) => `${c.set}:${c.number}`)).toEqual([
      'khm:5',
      'm21:9',
      'm21:10',
      'm21:9a'
    ])
  })

  it('round-trips through the canonical form', () => {
    const creature = card({
      faces: [{ name: 'Dog', type: 'Creature', cost: '{W}', text: '', power: '2', toughness: '2' }]
    })

    expect(cardFromJson(JSON.parse(JSON.stringify(cardToJson(creature))))).toEqual(creature)
  })

  it('round-trips owned cards', () => {
    const owned: OwnedCard = { ...card(), count: 3, foil: false, condition: 'heavy-used' }

    expect(ownedCardFromJson(ownedCardToJson(owned))).toEqual(owned)
  })

  it('rejects malformed stored cards', () => {
    expect(() => cardFromJson({ id: 'x' })).toThrow('Expected card.set to be a string')
    expect(() => ownedCardFromJson({ ...cardToJson(card()), count: 0 })).toThrow(TypeError)
    expect(() =>
      ownedCardFromJson({ ...cardToJson(card()), count: 1, condition: 'pristine' })
    ).toThrow("Unknown card condition 'pristine'")
  })
})
