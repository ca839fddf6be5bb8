/**
 * Icon Resolver Interface
 * Finds an icon file in the desktop icon theme
 */
export interface IIconResolver {
	/**
	 * Absolute path of the best variant of `iconName` (scalable first, then
	 * the largest raster), or null when the theme has none
	 */
	resolve(iconName: string): string | null;
}
