/**
 * Export Module
 *
 * Static HTML binder pages.
 */

export {
  ASSETS_DIR,
  BINDER_STYLES,
  type BinderPage,
  backImageSlug,
  cardCaption,
  cardImageSlug,
  IMAGES_DIR,
  pageFileName,
  paginate,
  renderBinderPage,
  renderIndexPage,
  STYLES_FILE
} from './binder-html'
