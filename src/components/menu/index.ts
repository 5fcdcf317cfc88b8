/**
 * Menu Components
 */

export { SlideMenu, type SlideMenuProps } from './SlideMenu';
