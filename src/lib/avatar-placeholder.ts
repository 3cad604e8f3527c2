export const AVATAR_PLACEHOLDER =
  "data:image/svg+xml;utf8,<svg xmlns='http://www.w3.org/2000/svg' width='160' height='160' viewBox='0 0 160 160'><defs><linearGradient id='g' x1='0' y1='0' x2='1' y2='1'><stop offset='0%' stop-color='%233ed4c2'/><stop offset='100%' stop-color='%235b8dfd'/></linearGradient></defs><rect width='160' height='160' rx='20' fill='url(%23g)'/><text x='50%' y='54%' text-anchor='middle' font-family='Arial' font-size='64' fill='%23041020'>?</text></svg>"
