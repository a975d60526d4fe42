import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('wiki-metadata-cache');

export default LibLogger;
