import './pest';
