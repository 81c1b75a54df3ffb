export function product(id: number, title = `Product ${id}`): Record<string, unknown> {
  return {
    id,
    title,
    handle: title.toLowerCase().replace(/\s+/g, '-'),
    vendor: 'Fizz Co',
    tags: ['seltzer'],
    variants: [{ id: id * 10, title: '12 pack', price: '24.00', available: true }],
    images: [],
  };
}

export function productsResponse(
  products: Array<Record<string, unknown>>,
  nextToken?: string,
  status = 200,
): Response {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (nextToken) {
    headers.link = `<https://shop.example/products.json?limit=250&page_info=${nextToken}>; rel="next"`;
  }
  return new Response(JSON.stringify({ products }), { status, headers });
}
