/**
 * Public page listing traffic density for the border gates.
 */
export const DEFAULT_BORDER_SOURCE_URL = 'https://www.und.org.tr/sinir-kapilari-yogunluk-durumu';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';
