export { Footer, footerText } from "./Footer";
export { Header, headerText } from "./Header";
export { formatRow, ListView, pageIndicator } from "./ListView";
