import { SerialPort } from 'serialport';
import type { SerialLink, SerialLinkFactory } from '../models/link.model';

function wrapPort(port: SerialPort): SerialLink {
  return {
    write: (chunk) =>
      new Promise<void>((resolve, reject) => {
        port.write(chunk, (writeErr) => {
          if (writeErr) return reject(writeErr);
          port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!port.isOpen) return resolve();
        port.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/** Open a serial device (e.g. /dev/rfcomm0, /dev/ttyUSB0) */
export const openSerialLink: SerialLinkFactory = (path, baudRate) =>
  new Promise<SerialLink>((resolve, reject) => {
    const port = new SerialPort({ path, baudRate, autoOpen: false });
    port.open((err) => (err ? reject(err) : resolve(wrapPort(port))));
  });
