import http from 'node:http';

/** Sobe o servidor em porta livre no loopback e devolve a URL base. */
export async function listenOnLoopback(server: http.Server): Promise<string> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Servidor sem porta TCP');
  }
  return `http://127.0.0.1:${address.port}`;
}

export async function closeServer(server: http.Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
}
