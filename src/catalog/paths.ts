/**
 * Catalog Cache Paths
 *
 * Canonical cache locations for every cached lookup. These are the keys of
 * the persisted catalog cache, so changing one orphans data from earlier runs.
 *
 * ```
 * /sets/{set}/cards/{number}/{lang}           card data
 * /sets/{set}/info                            set data
 * /sets/{set}/defaults/{name}                 default collector number
 * /id-map/cards/scryfall/{id}                 { set, number, lang }
 * /static/{catalog}                           { retrievedAt, data }
 * /images/set-{SET}/card-{NUM}/{file}         card image (file cache)
 * /images/misc/back.jpg                       card back (file cache)
 * ```
 */

export const IMAGE_SIZES = {
  full: { apiName: 'png', format: 'png', width: 745, height: 1040 },
  large: { apiName: 'large', format: 'jpg', width: 672, height: 936 },
  normal: { apiName: 'normal', format: 'jpg', width: 488, height: 680 },
  small: { apiName: 'small', format: 'jpg', width: 146, height: 204 }
} as const

export type ImageSize = keyof typeof IMAGE_SIZES

export const DEFAULT_LANG = 'en'

export const BACK_IMAGE_URL = 'https://c2.scryfall.com/file/scryfall-errors/missing.jpg'

export function isImageSize(value: string): value is ImageSize {
  return Object.hasOwn(IMAGE_SIZES, value)
}

/**
 * Zero-pad purely numeric collector numbers to three digits. Anything else
 * ("12a", "★5") is returned unchanged.
 */
export function padNumber(number: string): string {
  return /^\d+$/.test(number) ? String(Number.parseInt(number, 10)).padStart(3, '0') : number
}

export function cardPath(set: string, number: string, lang?: string): string {
  return `/sets/${set.toLowerCase()}/cards/${number}/${lang || DEFAULT_LANG}`
}

export function idMapPath(id: string): string {
  return `/id-map/cards/scryfall/${id}`
}

export function setInfoPath(code: string): string {
  return `/sets/${code.toLowerCase()}/info`
}

export function defaultNumberPath(set: string, name: string): string {
  return `/sets/${set.toLowerCase()}/defaults/${name.toLowerCase().replace(/[\s/]/g, '_')}`
}

export function catalogPath(catalogType: string): string {
  return `/static/${catalogType}`
}

export interface ImageRef {
  readonly set: string
  readonly number: string
  readonly lang?: string | undefined
  readonly size: ImageSize
  readonly back?: boolean | undefined
}

/**
 * File name of a card image, e.g. `M21-002-front-large-en.jpg`.
 */
export function imageFileName(ref: ImageRef): string {
  const set = ref.set.toUpperCase()
  const side = ref.back ? 'back' : 'front'
  const { format } = IMAGE_SIZES[ref.size]
  return `${set}-${padNumber(ref.number)}-${side}-${ref.size}-${ref.lang || DEFAULT_LANG}.${format}`
}

export function imagePath(ref: ImageRef): string {
  return `/images/set-${ref.set.toUpperCase()}/card-${padNumber(ref.number)}/${imageFileName(ref)}`
}

export function backImageFormat(): string {
  return BACK_IMAGE_URL.slice(BACK_IMAGE_URL.lastIndexOf('.') + 1)
}

export function backImagePath(): string {
  return `/images/misc/back.${backImageFormat()}`
}
